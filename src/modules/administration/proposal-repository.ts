import type { DbPool } from "../../db/pool.js";
import type { MeetingGroupProposal, ProposalStatus } from "./meeting-group-proposal.js";

import { ensureSchema } from "../../db/pool.js";

export interface ProposalRepository {
  ensureSchema(): Promise<void>;
  save(proposal: MeetingGroupProposal): Promise<void>;
  findById(id: string): Promise<MeetingGroupProposal | null>;
  list(): Promise<MeetingGroupProposal[]>;
  close?(): Promise<void>;
}

export class InMemoryProposalRepository implements ProposalRepository {
  private readonly proposals = new Map<string, MeetingGroupProposal>();

  async ensureSchema() {}

  async save(proposal: MeetingGroupProposal) {
    this.proposals.set(proposal.id, { ...proposal });
  }

  async findById(id: string) {
    const proposal = this.proposals.get(id);
    return proposal ? { ...proposal } : null;
  }

  async list() {
    return [...this.proposals.values()]
      .sort((a, b) => a.proposedAt.getTime() - b.proposedAt.getTime())
      .map((proposal) => ({ ...proposal }));
  }
}

function toStatus(value: unknown): ProposalStatus {
  return value === "accepted" ? "accepted" : "in_verification";
}

function mapRow(row: Record<string, unknown>): MeetingGroupProposal {
  return {
    id: String(row["id"]),
    name: String(row["name"]),
    description: typeof row["description"] === "string" ? row["description"] : null,
    city: String(row["city"]),
    countryCode: String(row["country_code"]),
    proposedBy: String(row["proposed_by"]),
    proposedAt: new Date(String(row["proposed_at"])),
    status: toStatus(row["status"]),
    decidedBy: typeof row["decided_by"] === "string" ? row["decided_by"] : null,
    decidedAt: row["decided_at"] ? new Date(String(row["decided_at"])) : null,
  };
}

export class PostgresProposalRepository implements ProposalRepository {
  constructor(private readonly pool: DbPool) {}

  async ensureSchema() {
    await ensureSchema(this.pool, [
      "create schema if not exists administration",
      `create table if not exists administration.meeting_group_proposals (
         id uuid primary key,
         name text not null,
         description text,
         city text not null,
         country_code char(2) not null,
         proposed_by text not null,
         proposed_at timestamptz not null,
         status text not null,
         decided_by text,
         decided_at timestamptz
       )`,
    ]);
  }

  async save(proposal: MeetingGroupProposal) {
    await this.pool.query(
      `insert into administration.meeting_group_proposals
         (id, name, description, city, country_code, proposed_by, proposed_at, status, decided_by, decided_at)
       values ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       on conflict (id)
       do update set
         status = excluded.status,
         decided_by = excluded.decided_by,
         decided_at = excluded.decided_at`,
      [
        proposal.id,
        proposal.name,
        proposal.description,
        proposal.city,
        proposal.countryCode,
        proposal.proposedBy,
        proposal.proposedAt,
        proposal.status,
        proposal.decidedBy,
        proposal.decidedAt,
      ],
    );
  }

  async findById(id: string) {
    const result = await this.pool.query("select * from administration.meeting_group_proposals where id = $1", [id]);
    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }

  async list() {
    const result = await this.pool.query(
      "select * from administration.meeting_group_proposals order by proposed_at asc",
    );
    return result.rows.map(mapRow);
  }

  async close() {
    await this.pool.end();
  }
}
