// =====================================================
// Notification Template Library
// =====================================================
// Reminder texts per template and locale. Services pass a
// variables map and never build message text themselves.
//
// VARIABLE FORMAT: {variableName}, replaced at render time.
// Unresolved variables are left as-is (never throw on missing vars).

import { OccurrenceKind } from '@yahrzeit-reminders/shared-types';
import type {
  LunisolarMonthDay,
  RenderedPayload,
  SolarDateString,
} from '@yahrzeit-reminders/shared-types';
import type { RecipientLocale } from '../records/record.types';
import { formatMonthDayEnglish, formatMonthDayHebrew } from '../calendar/hebrew-date.format';
import { addDays } from '../calendar/solar-date';

// =====================================================
// Types
// =====================================================

export interface NotificationTemplate {
  /** Email subject line; group messages use it as a bold header */
  subject: string;
  body: string;
}

export const YAHRZEIT_REMINDER_TEMPLATE = 'yahrzeit.reminder';
export const FIRST_OBSERVANCE_REMINDER_TEMPLATE = 'yahrzeit.first-observance';

// =====================================================
// Template Definitions
// =====================================================

export const TEMPLATES: Record<string, Record<RecipientLocale, NotificationTemplate>> = {
  [YAHRZEIT_REMINDER_TEMPLATE]: {
    en: {
      subject: 'Yahrzeit reminder: {subjectName}',
      body:
        'Dear {recipientName},\n\n' +
        'The yahrzeit of {subjectName} falls on {anniversaryDate}, which this year is {occurrenceDate}. ' +
        'The observance begins at sundown on {eveningBefore}.',
    },
    he: {
      subject: 'תזכורת יום השנה: {subjectName}',
      body:
        '{recipientName} שלום,\n\n' +
        'יום השנה לפטירת {subjectName} חל ב־{anniversaryDateHebrew}, השנה בתאריך {occurrenceDate}. ' +
        'יום הזיכרון מתחיל בשקיעה בערב {eveningBefore}.',
    },
  },
  [FIRST_OBSERVANCE_REMINDER_TEMPLATE]: {
    en: {
      subject: 'First-year memorial reminder: {subjectName}',
      body:
        'Dear {recipientName},\n\n' +
        'The first-year memorial of {subjectName} falls on {occurrenceDate}. ' +
        'The observance begins at sundown on {eveningBefore}.',
    },
    he: {
      subject: 'תזכורת אזכרה: {subjectName}',
      body:
        '{recipientName} שלום,\n\n' +
        'האזכרה לשנה הראשונה לפטירת {subjectName} חלה בתאריך {occurrenceDate}. ' +
        'יום הזיכרון מתחיל בשקיעה בערב {eveningBefore}.',
    },
  },
};

// =====================================================
// Template Rendering
// =====================================================

/**
 * Render a template with variable substitution.
 *
 * If a variable is present in the template but absent from the
 * `variables` map, the placeholder is left unchanged so missing
 * variables show up in QA instead of silently disappearing.
 *
 * @throws Error if templateId is not found
 */
export function renderTemplate(
  templateId: string,
  locale: RecipientLocale,
  variables: Record<string, string | number>,
): RenderedPayload {
  const template = TEMPLATES[templateId]?.[locale];
  if (!template) {
    throw new Error(`Unknown notification template: "${templateId}" (${locale})`);
  }

  const interpolate = (text: string): string =>
    text.replace(/\{(\w+)\}/g, (match, key: string) => {
      const value = variables[key];
      // Leave placeholder intact when variable not provided
      return value !== undefined ? String(value) : match;
    });

  return {
    templateId,
    locale,
    subject: interpolate(template.subject),
    body: interpolate(template.body),
    variables,
  };
}

// =====================================================
// Yahrzeit Reminder
// =====================================================

export interface ReminderContext {
  subjectName: string;
  recipientName: string;
  locale: RecipientLocale;
  kind: OccurrenceKind;
  anniversary: LunisolarMonthDay;
  occurrenceSolar: SolarDateString;
}

/**
 * Rendered once when the ledger entry is created; retries resend
 * the stored payload rather than re-rendering.
 */
export function renderYahrzeitReminder(context: ReminderContext): RenderedPayload {
  const templateId =
    context.kind === OccurrenceKind.FIRST_OBSERVANCE
      ? FIRST_OBSERVANCE_REMINDER_TEMPLATE
      : YAHRZEIT_REMINDER_TEMPLATE;

  return renderTemplate(templateId, context.locale, {
    subjectName: context.subjectName,
    recipientName: context.recipientName,
    anniversaryDate: formatMonthDayEnglish(context.anniversary),
    anniversaryDateHebrew: formatMonthDayHebrew(context.anniversary),
    occurrenceDate: context.occurrenceSolar,
    // Hebrew days begin at nightfall
    eveningBefore: addDays(context.occurrenceSolar, -1),
  });
}
