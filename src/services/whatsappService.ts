// ============================================
// src/services/whatsappService.ts
// ============================================

import twilio from 'twilio';
import { Logger } from '../utils/loggers';
import { errorMessage } from '../utils/errors';
import { withTimeout } from '../utils/withTimeout';
import { renderTemplate, TemplateDataMap, TemplateKind } from '../utils/notificationTemplates';

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────

export interface Notifier {
  /** Resolves to the provider message id, or null when nothing was delivered. */
  send<K extends TemplateKind>(phone: string, kind: K, data: TemplateDataMap[K]): Promise<string | null>;
}

interface WhatsAppOptions {
  accountSid?: string;
  authToken?: string;
  whatsappNumber: string;
  timeoutMs: number;
}

type TwilioClient = ReturnType<typeof twilio>;

// ─────────────────────────────────────────────────────────────
// WhatsApp Service (Twilio)
// ─────────────────────────────────────────────────────────────

export class WhatsAppService implements Notifier {
  private readonly client: TwilioClient | null;

  constructor(private readonly options: WhatsAppOptions) {
    if (options.accountSid && options.authToken) {
      this.client = twilio(options.accountSid, options.authToken);
    } else {
      this.client = null;
      Logger.warning('Twilio credentials missing, WhatsApp notifications are disabled');
    }
  }

  async send<K extends TemplateKind>(phone: string, kind: K, data: TemplateDataMap[K]): Promise<string | null> {
    if (!this.client) return null;

    const to = phone.startsWith('whatsapp:') ? phone : `whatsapp:${phone}`;
    try {
      const message = await withTimeout(
        this.client.messages.create({
          from: this.options.whatsappNumber,
          to,
          body: renderTemplate(kind, data),
        }),
        this.options.timeoutMs,
        `WhatsApp ${kind} message`
      );
      Logger.info(`WhatsApp ${kind} message sent`, { sid: message.sid });
      return message.sid;
    } catch (error) {
      Logger.error(`WhatsApp ${kind} message to ${to} failed`, errorMessage(error));
      return null;
    }
  }
}

/**
 * Starts a best-effort side effect after the main operation has committed.
 * Failures are logged and never reach the caller.
 */
export const runInBackground = (label: string, task: () => Promise<unknown>): void => {
  void task().catch((error: unknown) => {
    Logger.error(`${label} failed`, errorMessage(error));
  });
};
