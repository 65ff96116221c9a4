// =====================================================
// Recipient Repository
// =====================================================

import type { SqliteDatabase } from '../../lib/database';
import { parseChannelKind } from './record.types';
import type { Recipient, RecipientInput } from './record.types';

interface RecipientRow {
  id: string;
  subject_id: string;
  display_name: string;
  channel_kind: string;
  address: string;
  locale: string;
  active: number;
  opted_out: number;
  deactivation_reason: string | null;
  created_at: string;
  updated_at: string;
}

export class RecipientRepository {
  constructor(private readonly db: SqliteDatabase) {}

  findById(id: string): Recipient | null {
    const row = this.db
      .prepare<[string], RecipientRow>('SELECT * FROM recipients WHERE id = ?')
      .get(id);
    return row ? toRecipient(row) : null;
  }

  upsert(input: RecipientInput, now: Date): Recipient {
    this.db
      .prepare(
        `INSERT INTO recipients (
           id, subject_id, display_name, channel_kind, address, locale,
           active, opted_out, deactivation_reason, created_at, updated_at
         ) VALUES (
           @id, @subjectId, @displayName, @channelKind, @address, @locale,
           @active, @optedOut, NULL, @now, @now
         )
         ON CONFLICT(id) DO UPDATE SET
           subject_id = excluded.subject_id,
           display_name = excluded.display_name,
           channel_kind = excluded.channel_kind,
           address = excluded.address,
           locale = excluded.locale,
           active = excluded.active,
           opted_out = excluded.opted_out,
           deactivation_reason = CASE WHEN excluded.active = 1 THEN NULL ELSE recipients.deactivation_reason END,
           updated_at = excluded.updated_at`
      )
      .run({
        id: input.id,
        subjectId: input.subjectId,
        displayName: input.displayName,
        channelKind: input.channelKind,
        address: input.address,
        locale: input.locale,
        active: input.active ? 1 : 0,
        optedOut: input.optedOut ? 1 : 0,
        now: now.toISOString(),
      });

    const recipient = this.findById(input.id);
    if (!recipient) throw new Error(`Recipient ${input.id} disappeared`);
    return recipient;
  }

  /** Active, non-opted-out recipients of one subject */
  listEligibleForSubject(subjectId: string): Recipient[] {
    return this.db
      .prepare<[string], RecipientRow>(
        `SELECT * FROM recipients
         WHERE subject_id = ? AND active = 1 AND opted_out = 0
         ORDER BY created_at ASC, id ASC`
      )
      .all(subjectId)
      .map(toRecipient);
  }

  listBySubject(subjectId: string): Recipient[] {
    return this.db
      .prepare<[string], RecipientRow>('SELECT * FROM recipients WHERE subject_id = ? ORDER BY created_at ASC, id ASC')
      .all(subjectId)
      .map(toRecipient);
  }

  deactivate(id: string, reason: string, now: Date): boolean {
    const result = this.db
      .prepare(
        `UPDATE recipients SET active = 0, deactivation_reason = @reason, updated_at = @now
         WHERE id = @id AND active = 1`
      )
      .run({ id, reason, now: now.toISOString() });
    return result.changes === 1;
  }

  optOut(id: string, now: Date): boolean {
    const result = this.db
      .prepare(
        `UPDATE recipients SET opted_out = 1, updated_at = @now
         WHERE id = @id AND opted_out = 0`
      )
      .run({ id, now: now.toISOString() });
    return result.changes === 1;
  }
}

function toRecipient(row: RecipientRow): Recipient {
  return {
    id: row.id,
    subjectId: row.subject_id,
    displayName: row.display_name,
    channelKind: parseChannelKind(row.channel_kind),
    address: row.address,
    locale: row.locale === 'he' ? 'he' : 'en',
    active: row.active === 1,
    optedOut: row.opted_out === 1,
    deactivationReason: row.deactivation_reason,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}
