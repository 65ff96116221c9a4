// =====================================================
// Hooks Module Exports
// =====================================================

export { createHooksRouter } from './hooks.controller';
export * from './hooks.schemas';
