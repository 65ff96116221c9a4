// =====================================================
// Service Container
// =====================================================
// Every service is built once here and handed to the HTTP
// layer and the queue workers. Tests build their own container
// with an in-memory database, fake channels and a fixed clock.

import { config as defaultConfig } from './config';
import type { AppConfig } from './config';
import { closeDatabase, openDatabase } from './lib/database';
import type { SqliteDatabase } from './lib/database';
import { RedisRunLock } from './lib/run-lock';
import type { RunLock } from './lib/run-lock';
import { getRedisConnection } from './queues/connection';
import { AnniversaryCalculator } from './services/anniversary/anniversary-calculator';
import { CachedYearTableSource } from './services/calendar/cached-year-table.source';
import { CalendarConverter } from './services/calendar/calendar-converter';
import { ComputedYearTableSource } from './services/calendar/computed-year-table.source';
import { HebcalYearTableSource } from './services/calendar/hebcal-year-table.source';
import type { YearTableSource } from './services/calendar/year-table.source';
import { YearTableRepository } from './services/calendar/year-table.repository';
import { NotificationEventBus } from './services/events/notification-events';
import { LedgerRepository } from './services/ledger/ledger.repository';
import {
  ChannelRegistry,
  EmailChannel,
  GroupMessageChannel,
  NotificationDispatcherService,
  NotificationSchedulerService,
} from './services/notifications';
import { RecipientRepository } from './services/records/recipient.repository';
import { RecordHooksService } from './services/records/record-hooks.service';
import { SubjectRepository } from './services/records/subject.repository';
import { systemClock } from './utils/clock';
import type { Clock } from './utils/clock';
import { logger } from './utils/logger';

export interface Container {
  config: AppConfig;
  db: SqliteDatabase;
  clock: Clock;
  events: NotificationEventBus;
  subjects: SubjectRepository;
  recipients: RecipientRepository;
  ledger: LedgerRepository;
  converter: CalendarConverter;
  calculator: AnniversaryCalculator;
  channels: ChannelRegistry;
  scheduler: NotificationSchedulerService;
  dispatcher: NotificationDispatcherService;
  hooks: RecordHooksService;
  close(): void;
}

export interface ContainerOverrides {
  config?: AppConfig;
  db?: SqliteDatabase;
  clock?: Clock;
  runLock?: RunLock;
  channels?: ChannelRegistry;
  yearTableSource?: YearTableSource;
  random?: () => number;
}

export function createContainer(overrides: ContainerOverrides = {}): Container {
  const config = overrides.config ?? defaultConfig;
  const db = overrides.db ?? openDatabase(config.database.path);
  const clock = overrides.clock ?? systemClock;

  const subjects = new SubjectRepository(db);
  const recipients = new RecipientRepository(db);
  const ledger = new LedgerRepository(db);
  const events = new NotificationEventBus();

  const converter = new CalendarConverter(overrides.yearTableSource ?? buildYearTableSource(config, db, clock));
  const calculator = new AnniversaryCalculator(converter, { offsetMonths: config.anniversary.offsetMonths });
  const channels = overrides.channels ?? buildChannels(config);
  const runLock = overrides.runLock ?? new RedisRunLock(getRedisConnection());

  const scheduler = new NotificationSchedulerService({
    db,
    subjects,
    recipients,
    ledger,
    calculator,
    events,
    runLock,
    clock,
    options: {
      leadDays: config.scheduler.leadDays,
      lookaheadDays: config.scheduler.lookaheadDays,
      graceDays: config.scheduler.graceDays,
      timezone: config.scheduler.timezone,
      sendHourUtc: config.scheduler.sendHourUtc,
      runLockTtlMs: config.scheduler.runLockTtlMs,
    },
  });

  const dispatcher = new NotificationDispatcherService({
    ledger,
    subjects,
    recipients,
    channels,
    events,
    clock,
    random: overrides.random,
    options: {
      batchSize: config.dispatch.batchSize,
      maxAttempts: config.dispatch.maxAttempts,
      claimTimeoutMs: config.dispatch.claimTimeoutMs,
      backoff: {
        baseMs: config.dispatch.backoffBaseMs,
        maxMs: config.dispatch.backoffMaxMs,
        jitter: config.dispatch.backoffJitter,
      },
    },
  });

  const hooks = new RecordHooksService({
    db,
    subjects,
    recipients,
    ledger,
    calculator,
    converter,
    clock,
    timezone: config.scheduler.timezone,
  });

  return {
    config,
    db,
    clock,
    events,
    subjects,
    recipients,
    ledger,
    converter,
    calculator,
    channels,
    scheduler,
    dispatcher,
    hooks,
    close: () => closeDatabase(db),
  };
}

function buildYearTableSource(config: AppConfig, db: SqliteDatabase, clock: Clock): YearTableSource {
  if (config.calendar.source === 'computed') {
    return new ComputedYearTableSource();
  }

  const live = new HebcalYearTableSource({
    baseUrl: config.calendar.hebcalBaseUrl,
    timeoutMs: config.calendar.requestTimeoutMs,
  });
  return new CachedYearTableSource(live, new YearTableRepository(db), {
    ttlMs: config.calendar.cacheTtlMs,
    clock,
  });
}

function buildChannels(config: AppConfig): ChannelRegistry {
  const registry = new ChannelRegistry();

  if (config.email.resendApiKey) {
    registry.register(
      EmailChannel.fromApiKey(config.email.resendApiKey, {
        fromAddress: config.email.fromAddress,
        fromName: config.email.fromName,
      })
    );
  } else {
    logger.warn('[Container] RESEND_API_KEY not set, email reminders will not be delivered');
  }

  if (config.groupMessage.accessToken && config.groupMessage.senderId) {
    registry.register(
      new GroupMessageChannel({
        apiBaseUrl: config.groupMessage.apiBaseUrl,
        accessToken: config.groupMessage.accessToken,
        senderId: config.groupMessage.senderId,
        timeoutMs: config.groupMessage.requestTimeoutMs,
      })
    );
  } else {
    logger.warn('[Container] Group messaging not configured, group reminders will not be delivered');
  }

  return registry;
}
