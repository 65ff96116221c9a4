// =====================================================
// Channel Contract
// =====================================================
// Uniform send capability over email and messaging-app
// groups. Adapters own provider specifics, including rate
// limits; the dispatcher only sees these three outcomes.

import type { ChannelKind, RenderedPayload } from '@yahrzeit-reminders/shared-types';

export type ChannelSendResult =
  | { outcome: 'accepted'; providerMessageId: string | null }
  /** Permanent: bad address, unsubscribed, group gone */
  | { outcome: 'rejected'; reason: string }
  /** Retryable: throttling, timeout, provider 5xx */
  | { outcome: 'transient_error'; reason: string };

export interface NotificationChannel {
  readonly kind: ChannelKind;
  send(address: string, payload: RenderedPayload): Promise<ChannelSendResult>;
}
