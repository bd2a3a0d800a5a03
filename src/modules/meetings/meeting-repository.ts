import type { DbPool } from "../../db/pool.js";
import type { Meeting } from "./meeting.js";

import { ensureSchema } from "../../db/pool.js";

export interface MeetingRepository {
  ensureSchema(): Promise<void>;
  add(meeting: Meeting): Promise<void>;
  findById(id: string): Promise<Meeting | null>;
  remove(id: string): Promise<void>;
  close?(): Promise<void>;
}

export class InMemoryMeetingRepository implements MeetingRepository {
  private readonly meetings = new Map<string, Meeting>();

  async ensureSchema() {}

  async add(meeting: Meeting) {
    this.meetings.set(meeting.id, { ...meeting, attendees: [...meeting.attendees] });
  }

  async findById(id: string) {
    const meeting = this.meetings.get(id);
    return meeting ? { ...meeting, attendees: [...meeting.attendees] } : null;
  }

  async remove(id: string) {
    this.meetings.delete(id);
  }
}

function mapRow(row: Record<string, unknown>): Meeting {
  const attendees = row["attendees"];
  return {
    id: String(row["id"]),
    title: String(row["title"]),
    description: typeof row["description"] === "string" ? row["description"] : null,
    organizerId: String(row["organizer_id"]),
    startsAt: new Date(String(row["starts_at"])),
    endsAt: new Date(String(row["ends_at"])),
    attendeesLimit: typeof row["attendees_limit"] === "number" ? row["attendees_limit"] : null,
    attendees: Array.isArray(attendees) ? attendees.map(String) : [],
    createdAt: new Date(String(row["created_at"])),
  };
}

export class PostgresMeetingRepository implements MeetingRepository {
  constructor(private readonly pool: DbPool) {}

  async ensureSchema() {
    await ensureSchema(this.pool, [
      "create schema if not exists meetings",
      `create table if not exists meetings.meetings (
         id uuid primary key,
         title text not null,
         description text,
         organizer_id text not null,
         starts_at timestamptz not null,
         ends_at timestamptz not null,
         attendees_limit integer,
         attendees text[] not null default '{}',
         created_at timestamptz not null default now()
       )`,
    ]);
  }

  async add(meeting: Meeting) {
    await this.pool.query(
      `insert into meetings.meetings
         (id, title, description, organizer_id, starts_at, ends_at, attendees_limit, attendees, created_at)
       values ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
      [
        meeting.id,
        meeting.title,
        meeting.description,
        meeting.organizerId,
        meeting.startsAt,
        meeting.endsAt,
        meeting.attendeesLimit,
        meeting.attendees,
        meeting.createdAt,
      ],
    );
  }

  async findById(id: string) {
    const result = await this.pool.query("select * from meetings.meetings where id = $1", [id]);
    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }

  async remove(id: string) {
    await this.pool.query("delete from meetings.meetings where id = $1", [id]);
  }

  async close() {
    await this.pool.end();
  }
}
