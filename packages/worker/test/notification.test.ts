import assert from "assert";
import type { FmtString } from "telegraf/format";
import { MatchResult, silentLogger } from "@chanwatch/core";
import { formatNotification, formatPrice, formatTimestamp } from "../src/notify/formatNotification";
import { TelegramNotifier, TelegramSender } from "../src/notify/TelegramNotifier";

const MATCH: MatchResult = {
  productName: "Phone",
  matchedKeywords: ["phone", "iphone"],
  price: 250,
  currency: "$",
  notify: true,
};

const ALL_ON = { includeKeywords: true, includeLink: true };

// [type, covered text] for every entity, plus the url of links
function spans(out: FmtString): string[][] {
  return (out.entities ?? []).map((e) => {
    const covered = out.text.slice(e.offset, e.offset + e.length);
    return e.type === "text_link" ? [e.type, covered, e.url] : [e.type, covered];
  });
}

function testFullNotification() {
  const out = formatNotification(
    {
      match: MATCH,
      messageText: "Selling iPhone for $250",
      messageLink: "https://t.me/deals/7",
      channelName: "@deals",
      messageDate: new Date("2024-05-01T10:04:05Z"),
    },
    ALL_ON
  );
  assert.strictEqual(
    out.text,
    [
      "🔔 Found: Phone\n",
      "📢 Channel: @deals",
      "🕒 Posted: 2024-05-01 10:04:05",
      "🔑 Keywords: phone, iphone",
      "💰 Price: $250.00",
      "",
      "📝 Message:\nSelling iPhone for $250",
      "\n🔗 View Original Message",
    ].join("\n")
  );
  assert.deepStrictEqual(spans(out), [
    ["bold", "Found: Phone"],
    ["bold", "Channel:"],
    ["bold", "Posted:"],
    ["bold", "Keywords:"],
    ["bold", "Price:"],
    ["bold", "Message:"],
    ["text_link", "View Original Message", "https://t.me/deals/7"],
  ]);
}

function testMinimalNotification() {
  const out = formatNotification(
    {
      match: { ...MATCH, price: null, currency: null },
      messageText: "phone",
      messageLink: "https://t.me/deals/7",
    },
    { includeKeywords: false, includeLink: false }
  );
  assert.strictEqual(out.text, "🔔 Found: Phone\n\n\n📝 Message:\nphone");
  assert.deepStrictEqual(spans(out), [
    ["bold", "Found: Phone"],
    ["bold", "Message:"],
  ]);
}

function testMarkupCharactersStayPlain() {
  const out = formatNotification(
    {
      match: MATCH,
      messageText: "new_phone_2024 *sale* [box] `sealed`",
      channelName: "@example_deals",
    },
    { includeKeywords: false, includeLink: false }
  );
  assert.ok(out.text.includes("📢 Channel: @example_deals\n"));
  assert.ok(out.text.endsWith("📝 Message:\nnew_phone_2024 *sale* [box] `sealed`"));
  assert.deepStrictEqual(spans(out), [
    ["bold", "Found: Phone"],
    ["bold", "Channel:"],
    ["bold", "Price:"],
    ["bold", "Message:"],
  ]);
}

function testTruncation() {
  const longText = "x".repeat(501);
  const out = formatNotification({ match: MATCH, messageText: longText }, ALL_ON);
  assert.ok(out.text.endsWith(`📝 Message:\n${"x".repeat(500)}...`));
  const exact = formatNotification({ match: MATCH, messageText: "y".repeat(500) }, ALL_ON);
  assert.ok(exact.text.endsWith(`📝 Message:\n${"y".repeat(500)}`));
}

function testPriceFormatting() {
  assert.strictEqual(formatPrice(250, "€"), "250.00€");
  assert.strictEqual(formatPrice(1234.5, "$"), "$1234.50");
  assert.strictEqual(formatPrice(99, ""), "99.00");
  assert.strictEqual(formatTimestamp(new Date("2024-12-31T23:59:59.999Z")), "2024-12-31 23:59:59");
}

async function testTelegramNotifier() {
  const sent: Array<{ chatId: number | string; text: FmtString; extra: unknown }> = [];
  const sender: TelegramSender = {
    async sendMessage(chatId, text, extra) {
      sent.push({ chatId, text, extra });
      return {};
    },
  };
  const notifier = new TelegramNotifier(sender, -100500, ALL_ON, silentLogger());
  await notifier.send({ match: MATCH, messageText: "phone_case $250", channelName: "@example_deals" });
  assert.strictEqual(sent.length, 1);
  assert.strictEqual(sent[0].chatId, -100500);
  assert.ok(sent[0].text.text.startsWith("🔔 Found: Phone\n"));
  assert.ok(sent[0].text.text.includes("@example_deals"));
  assert.deepStrictEqual(spans(sent[0].text)[0], ["bold", "Found: Phone"]);
  assert.deepStrictEqual(sent[0].extra, { link_preview_options: { is_disabled: true } });
}

async function run() {
  testFullNotification();
  testMinimalNotification();
  testMarkupCharactersStayPlain();
  testTruncation();
  testPriceFormatting();
  await testTelegramNotifier();
  // eslint-disable-next-line no-console
  console.log("notification tests passed");
}

run().catch((error) => {
  console.error(error);
  process.exit(1);
});
