// =====================================================
// Hooks Module - Validation Schemas
// =====================================================
// Payloads sent by the record-management component.

import { z } from 'zod';
import { ChannelKind } from '@yahrzeit-reminders/shared-types';
import { isSolarDateString } from '../../services/calendar/solar-date';

// ===========================================
// Shared Fields
// ===========================================

const recordIdSchema = z
  .string()
  .trim()
  .min(1, { message: 'ID is required' })
  .max(128, { message: 'ID must be at most 128 characters' });

export const solarDateSchema = z
  .string()
  .refine(isSolarDateString, { message: 'Must be a calendar date in YYYY-MM-DD form' });

const displayNameSchema = z.string().trim().min(1).max(200);

// ===========================================
// Path Parameter Schemas
// ===========================================

export const recordIdParamSchema = z.object({
  id: recordIdSchema,
});

// ===========================================
// Subject Schemas
// ===========================================

export const createSubjectSchema = z.object({
  id: recordIdSchema,
  displayName: displayNameSchema,
  deathDateSolar: solarDateSchema,
});

export const changeDeathDateSchema = z.object({
  deathDateSolar: solarDateSchema,
});

// ===========================================
// Recipient Schemas
// ===========================================

export const upsertRecipientSchema = z
  .object({
    subjectId: recordIdSchema,
    displayName: displayNameSchema,
    channelKind: z.nativeEnum(ChannelKind),
    address: z.string().trim().min(1).max(320),
    locale: z.enum(['en', 'he']).default('en'),
    active: z.boolean().default(true),
    optedOut: z.boolean().default(false),
  })
  .refine(
    (recipient) =>
      recipient.channelKind !== ChannelKind.EMAIL || z.string().email().safeParse(recipient.address).success,
    { message: 'Email recipients need a valid email address', path: ['address'] }
  );

export const deactivateRecipientSchema = z.object({
  reason: z.string().trim().min(1).max(500).optional(),
});

// ===========================================
// Query Schemas
// ===========================================

export const convertDateQuerySchema = z.object({
  date: solarDateSchema,
});

export type CreateSubjectBody = z.infer<typeof createSubjectSchema>;
export type ChangeDeathDateBody = z.infer<typeof changeDeathDateSchema>;
export type UpsertRecipientBody = z.infer<typeof upsertRecipientSchema>;
export type DeactivateRecipientBody = z.infer<typeof deactivateRecipientSchema>;
