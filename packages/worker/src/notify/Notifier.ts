import { Notification } from "./formatNotification";

export interface Notifier {
  name: string;
  send(notification: Notification): Promise<void>;
}
