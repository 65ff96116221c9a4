// =====================================================
// Channel Registry
// =====================================================

import type { ChannelKind } from '@yahrzeit-reminders/shared-types';
import { ChannelNotConfiguredError } from '../../../utils/errors';
import type { NotificationChannel } from './channel.types';

export class ChannelRegistry {
  private readonly channels = new Map<ChannelKind, NotificationChannel>();

  constructor(channels: NotificationChannel[] = []) {
    for (const channel of channels) this.register(channel);
  }

  register(channel: NotificationChannel): void {
    this.channels.set(channel.kind, channel);
  }

  get(kind: ChannelKind): NotificationChannel {
    const channel = this.channels.get(kind);
    if (!channel) throw new ChannelNotConfiguredError(kind);
    return channel;
  }
}
