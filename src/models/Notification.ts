export type NotificationType = 'login' | 'logout' | 'reminder' | 'alert';
export type DeliveryStatus = 'pending' | 'sent' | 'failed';

export interface NotificationEntry {
  id: string;
  userId: string;
  message: string;
  type: NotificationType;
  status: DeliveryStatus;
  sentAt: Date | null;
  errorMessage: string | null;
  createdAt: number;
}

export type DeliveryResult = { ok: true; reference?: string } | { ok: false; reason: string };

/** Outbound message transport, e.g. WhatsApp. Any result other than `ok` is terminal for the entry. */
export interface DeliveryChannel {
  send(address: string, message: string): Promise<DeliveryResult>;
}
