// =====================================================
// Reminder Service Shared Types
// =====================================================

export * from './api.types';
export * from './calendar.types';
export * from './ledger.types';
export * from './record.types';
export * from './events.types';
