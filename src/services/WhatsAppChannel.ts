import axios, { AxiosInstance } from 'axios';
import { DeliveryChannel, DeliveryResult } from '../models/Notification.js';

const TWILIO_API = 'https://api.twilio.com/2010-04-01';

export interface WhatsAppChannelOptions {
  accountSid: string;
  authToken: string;
  /** Sender number, with or without the `whatsapp:` prefix. */
  whatsappNumber: string;
  timeoutMs: number;
}

function withPrefix(phone: string): string {
  return phone.startsWith('whatsapp:') ? phone : `whatsapp:${phone}`;
}

function describeFailure(error: unknown, timeoutMs: number): string {
  if (!axios.isAxiosError(error)) {
    return error instanceof Error ? error.message : String(error);
  }

  if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
    return `Delivery timed out after ${timeoutMs}ms`;
  }

  if (error.response) {
    const data: unknown = error.response.data;
    const detail =
      typeof data === 'object' && data !== null && 'message' in data && typeof data.message === 'string'
        ? data.message
        : error.message;
    return `Twilio responded ${error.response.status}: ${detail}`;
  }

  return error.message;
}

/** Sends through the Twilio Messages API on the WhatsApp channel. */
export class WhatsAppChannel implements DeliveryChannel {
  private readonly client: AxiosInstance;

  constructor(
    private readonly options: WhatsAppChannelOptions,
    client?: AxiosInstance
  ) {
    this.client = client ?? axios.create();
  }

  async send(address: string, message: string): Promise<DeliveryResult> {
    const { accountSid, authToken, whatsappNumber, timeoutMs } = this.options;
    const body = new URLSearchParams({
      From: withPrefix(whatsappNumber),
      To: withPrefix(address),
      Body: message,
    });

    try {
      const response = await this.client.post<{ sid?: string }>(
        `${TWILIO_API}/Accounts/${encodeURIComponent(accountSid)}/Messages.json`,
        body.toString(),
        {
          auth: { username: accountSid, password: authToken },
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          timeout: timeoutMs,
        }
      );
      return { ok: true, reference: response.data.sid };
    } catch (error) {
      return { ok: false, reason: describeFailure(error, timeoutMs) };
    }
  }
}

/** Stand-in used when no Twilio credentials are configured; every send fails. */
export class UnconfiguredChannel implements DeliveryChannel {
  async send(): Promise<DeliveryResult> {
    return { ok: false, reason: 'WhatsApp service not configured' };
  }
}

export function createDeliveryChannel(options: WhatsAppChannelOptions): DeliveryChannel {
  if (options.accountSid && options.authToken && options.whatsappNumber) {
    console.log('✅ WhatsApp service initialized successfully');
    return new WhatsAppChannel(options);
  }

  console.warn('⚠️ WhatsApp service not configured. Notifications will be logged but not sent.');
  return new UnconfiguredChannel();
}
