import { randomUUID } from "node:crypto";

import { z } from "zod";

import { BusinessRuleViolationError } from "../../shared/errors.js";

export type ProposalStatus = "in_verification" | "accepted";

export interface MeetingGroupProposal {
  id: string;
  name: string;
  description: string | null;
  city: string;
  countryCode: string;
  proposedBy: string;
  proposedAt: Date;
  status: ProposalStatus;
  decidedBy: string | null;
  decidedAt: Date | null;
}

export const proposeMeetingGroupSchema = z.object({
  name: z.string().trim().min(1, "Meeting group name is required").max(255),
  description: z.string().trim().max(2000).optional(),
  city: z.string().trim().min(1, "City is required").max(100),
  countryCode: z
    .string()
    .trim()
    .regex(/^[A-Za-z]{2}$/, "Country code must be a two-letter ISO code")
    .transform((value) => value.toUpperCase()),
});

export type ProposeMeetingGroupCommand = z.output<typeof proposeMeetingGroupSchema>;

export function proposeMeetingGroup(
  command: ProposeMeetingGroupCommand,
  proposedBy: string,
  now = new Date(),
): MeetingGroupProposal {
  return {
    id: randomUUID(),
    name: command.name,
    description: command.description ?? null,
    city: command.city,
    countryCode: command.countryCode,
    proposedBy,
    proposedAt: now,
    status: "in_verification",
    decidedBy: null,
    decidedAt: null,
  };
}

export function acceptProposal(proposal: MeetingGroupProposal, decidedBy: string, now = new Date()): MeetingGroupProposal {
  if (proposal.status === "accepted") {
    throw new BusinessRuleViolationError(
      "MeetingGroupProposalCanBeAcceptedOnlyOnce",
      "Meeting group proposal has already been accepted",
    );
  }
  return { ...proposal, status: "accepted", decidedBy, decidedAt: now };
}

export function toProposalResponse(proposal: MeetingGroupProposal) {
  return {
    id: proposal.id,
    name: proposal.name,
    description: proposal.description,
    city: proposal.city,
    country_code: proposal.countryCode,
    proposed_by: proposal.proposedBy,
    proposed_at: proposal.proposedAt.toISOString(),
    status: proposal.status,
    decided_by: proposal.decidedBy,
    decided_at: proposal.decidedAt?.toISOString() ?? null,
  };
}
