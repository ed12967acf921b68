import { InsufficientCreditsError } from "../errors";
import type {
  CreditBalance,
  CreditLedger,
  LedgerEntry,
  LedgerEntryType,
  LedgerMutation,
  Queryable,
} from "./types";

type LedgerRow = {
  id: string | number;
  owner_id: string;
  type: string;
  amount: number;
  job_id: string | null;
  external_ref: string | null;
  note: string | null;
  created_at: Date;
};

const LEDGER_TYPES: readonly LedgerEntryType[] = ["grant", "debit", "refund"];

const toLedgerType = (value: string): LedgerEntryType => {
  const match = LEDGER_TYPES.find((type) => type === value);
  if (!match) {
    throw new Error(`credit_ledger.type holds unknown type "${value}"`);
  }
  return match;
};

const mapLedgerRow = (row: LedgerRow): LedgerEntry => ({
  id: Number(row.id),
  ownerId: row.owner_id,
  type: toLedgerType(row.type),
  amount: row.amount,
  jobId: row.job_id,
  externalRef: row.external_ref,
  note: row.note,
  createdAt: row.created_at,
});

/**
 * Postgres-backed credit ledger. Balance lives on `credit_accounts`; every
 * mutation appends a `credit_ledger` row. The unique (job_id, type) index keeps
 * debit and refund single per job even under concurrent callers.
 */
export class PgCreditLedger implements CreditLedger {
  constructor(private readonly db: Queryable) {}

  async balance(ownerId: string): Promise<CreditBalance> {
    const { rows } = await this.db.query<{ available_credits: number }>(
      `SELECT available_credits FROM credit_accounts WHERE owner_id = $1`,
      [ownerId],
    );
    return { ownerId, availableCredits: rows[0]?.available_credits ?? 0 };
  }

  async grant(
    ownerId: string,
    amount: number,
    note: string,
    externalRef: string | null,
  ): Promise<CreditBalance> {
    if (!Number.isInteger(amount) || amount <= 0) {
      throw new Error("Grant amount must be a positive integer");
    }
    const { rows } = await this.db.query<{ available_credits: number }>(
      `INSERT INTO credit_accounts (owner_id, available_credits)
       VALUES ($1, $2)
       ON CONFLICT (owner_id) DO UPDATE
         SET available_credits = credit_accounts.available_credits + EXCLUDED.available_credits,
             updated_at = NOW()
       RETURNING available_credits`,
      [ownerId, amount],
    );
    await this.db.query(
      `INSERT INTO credit_ledger (owner_id, type, amount, external_ref, note)
       VALUES ($1, 'grant', $2, $3, $4)`,
      [ownerId, amount, externalRef, note],
    );
    return { ownerId, availableCredits: rows[0]?.available_credits ?? amount };
  }

  async debit(
    ownerId: string,
    amount: number,
    jobId: string,
  ): Promise<LedgerMutation> {
    const existing = await this.findJobEntry(jobId, "debit");
    if (existing) {
      const current = await this.balance(existing.ownerId);
      return {
        applied: false,
        amount: existing.amount,
        balance: current.availableCredits,
      };
    }

    const { rows } = await this.db.query<{ available_credits: number }>(
      `SELECT available_credits FROM credit_accounts WHERE owner_id = $1 FOR UPDATE`,
      [ownerId],
    );
    const available = rows[0]?.available_credits ?? 0;
    if (available < amount) {
      throw new InsufficientCreditsError(ownerId, amount, available);
    }

    const updated = await this.db.query<{ available_credits: number }>(
      `UPDATE credit_accounts
          SET available_credits = available_credits - $2, updated_at = NOW()
        WHERE owner_id = $1
        RETURNING available_credits`,
      [ownerId, amount],
    );
    await this.db.query(
      `INSERT INTO credit_ledger (owner_id, type, amount, job_id)
       VALUES ($1, 'debit', $2, $3)`,
      [ownerId, amount, jobId],
    );
    return {
      applied: true,
      amount,
      balance: updated.rows[0]?.available_credits ?? available - amount,
    };
  }

  async refund(jobId: string): Promise<LedgerMutation> {
    const debit = await this.findJobEntry(jobId, "debit");
    if (!debit) {
      return { applied: false, amount: 0, balance: null };
    }
    const previous = await this.findJobEntry(jobId, "refund");
    if (previous) {
      const current = await this.balance(debit.ownerId);
      return {
        applied: false,
        amount: previous.amount,
        balance: current.availableCredits,
      };
    }

    const { rows } = await this.db.query<{ available_credits: number }>(
      `UPDATE credit_accounts
          SET available_credits = available_credits + $2, updated_at = NOW()
        WHERE owner_id = $1
        RETURNING available_credits`,
      [debit.ownerId, debit.amount],
    );
    await this.db.query(
      `INSERT INTO credit_ledger (owner_id, type, amount, job_id, note)
       VALUES ($1, 'refund', $2, $3, 'job failed')`,
      [debit.ownerId, debit.amount, jobId],
    );
    return {
      applied: true,
      amount: debit.amount,
      balance: rows[0]?.available_credits ?? null,
    };
  }

  async history(ownerId: string, limit: number): Promise<LedgerEntry[]> {
    const { rows } = await this.db.query<LedgerRow>(
      `SELECT * FROM credit_ledger
        WHERE owner_id = $1
        ORDER BY id DESC
        LIMIT $2`,
      [ownerId, limit],
    );
    return rows.map(mapLedgerRow);
  }

  private async findJobEntry(
    jobId: string,
    type: LedgerEntryType,
  ): Promise<LedgerEntry | null> {
    const { rows } = await this.db.query<LedgerRow>(
      `SELECT * FROM credit_ledger WHERE job_id = $1 AND type = $2 LIMIT 1`,
      [jobId, type],
    );
    return rows.length ? mapLedgerRow(rows[0]) : null;
  }
}
