import { randomUUID } from "node:crypto";

import { z } from "zod";

import { BusinessRuleViolationError } from "../../shared/errors.js";

export interface Meeting {
  id: string;
  title: string;
  description: string | null;
  organizerId: string;
  startsAt: Date;
  endsAt: Date;
  attendeesLimit: number | null;
  attendees: string[];
  createdAt: Date;
}

export const createMeetingSchema = z.object({
  title: z.string().trim().min(1, "Meeting title is required").max(200),
  description: z.string().trim().max(2000).optional(),
  startsAt: z.string().datetime({ offset: true }),
  endsAt: z.string().datetime({ offset: true }),
  attendeesLimit: z.number().int().positive().optional(),
  attendees: z.array(z.string().trim().min(1)).default([]),
});

export type CreateMeetingCommand = z.output<typeof createMeetingSchema>;

export function scheduleMeeting(command: CreateMeetingCommand, organizerId: string, now = new Date()): Meeting {
  const startsAt = new Date(command.startsAt);
  const endsAt = new Date(command.endsAt);
  if (startsAt.getTime() >= endsAt.getTime()) {
    throw new BusinessRuleViolationError("MeetingTermMustBeValid", "Meeting must start before it ends");
  }

  const attendees = [...new Set(command.attendees)];
  const attendeesLimit = command.attendeesLimit ?? null;
  if (attendeesLimit !== null && attendees.length > attendeesLimit) {
    throw new BusinessRuleViolationError(
      "MeetingAttendeesNumberMustBeWithinLimit",
      `Meeting allows at most ${attendeesLimit} attendees, got ${attendees.length}`,
    );
  }

  return {
    id: randomUUID(),
    title: command.title,
    description: command.description ?? null,
    organizerId,
    startsAt,
    endsAt,
    attendeesLimit,
    attendees,
    createdAt: now,
  };
}

export function ensureCanCancel(meeting: Meeting, userId: string) {
  if (meeting.organizerId !== userId) {
    throw new BusinessRuleViolationError(
      "OnlyOrganizerCanCancelMeeting",
      "Only the meeting organizer can cancel the meeting",
    );
  }
}

export function toMeetingResponse(meeting: Meeting) {
  return {
    id: meeting.id,
    title: meeting.title,
    description: meeting.description,
    organizer_id: meeting.organizerId,
    starts_at: meeting.startsAt.toISOString(),
    ends_at: meeting.endsAt.toISOString(),
    attendees_limit: meeting.attendeesLimit,
    attendees: meeting.attendees,
  };
}
