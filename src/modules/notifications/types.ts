export type Notifier = {
  send: (text: string) => Promise<void>;
};

export type NotificationTarget = {
  chatId: number | string;
  threadId?: number | null;
};

export type SignalMessageOptions = {
  pivotCurrency: string;
  tradeLinkBase: string;
  timeZone: string;
  now?: Date;
};
