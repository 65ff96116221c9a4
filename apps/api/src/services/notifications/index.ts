// =====================================================
// Notification Services - Barrel Export
// =====================================================

// Sweep and dispatch
export { NotificationSchedulerService, SWEEP_LOCK_KEY } from './notification-scheduler.service';
export type { SchedulerDependencies, SweepOptions, SweepResult } from './notification-scheduler.service';
export { NotificationDispatcherService } from './notification-dispatcher.service';
export type {
  DispatchOptions,
  DispatchPassResult,
  DispatcherDependencies,
  RecoveryResult,
} from './notification-dispatcher.service';

// Channels
export { ChannelRegistry } from './channels/channel-registry';
export { EmailChannel } from './channels/email.channel';
export { GroupMessageChannel } from './channels/group-message.channel';
export type { ChannelSendResult, NotificationChannel } from './channels/channel.types';

// Templates
export {
  FIRST_OBSERVANCE_REMINDER_TEMPLATE,
  renderTemplate,
  renderYahrzeitReminder,
  TEMPLATES,
  YAHRZEIT_REMINDER_TEMPLATE,
} from './notification-templates';

// Retry policy
export { computeBackoffDelay, nextRetryAt } from './backoff';
export type { BackoffPolicy } from './backoff';

// Timezone utilities
export { getLocalDate, resolveTimezone } from './timezone.utils';
