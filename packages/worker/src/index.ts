export * from "./channels";
export * from "./messages/types";
export * from "./messages/age";
export * from "./messages/messageFile";
export * from "./notify/formatNotification";
export * from "./notify/Notifier";
export * from "./notify/LogNotifier";
export * from "./notify/TelegramNotifier";
export * from "./storage/sqlite";
export * from "./monitor/processMessage";
export * from "./monitor/scanHistory";
export * from "./monitor/watch";
export * from "./runtime";
export { runCli } from "./cli/index";
