// =====================================================
// Queue Module Exports
// =====================================================

export * from './connection';
export * from './anniversary-sweep.queue';
export * from './notification-dispatch.queue';
