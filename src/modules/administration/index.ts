import { z } from "zod";

import type { ModuleDescriptor, ModuleHandle, SharedInfrastructure } from "../../composition/module-descriptor.js";
import type { ProposalRepository } from "./proposal-repository.js";

import { createPool, openStore } from "../../db/pool.js";
import { moduleLogger } from "../../platform/logger.js";
import { NotFoundError, UnauthorizedError } from "../../shared/errors.js";
import { parseCommand } from "../../shared/validation.js";
import {
  acceptProposal,
  proposeMeetingGroup,
  proposeMeetingGroupSchema,
  toProposalResponse,
} from "./meeting-group-proposal.js";
import { PostgresProposalRepository } from "./proposal-repository.js";

export const ADMINISTRATION_MODULE = "Administration";

export const administrationPolicies = {
  ProposeMeetingGroup: "administration.proposals.create",
  GetMeetingGroupProposals: "administration.proposals.read",
  AcceptMeetingGroupProposal: "administration.proposals.accept",
} as const;

const proposalIdSchema = z.string().uuid();

export interface AdministrationModuleOptions {
  repository?: ProposalRepository;
}

export function createAdministrationModule(options: AdministrationModuleOptions = {}): ModuleDescriptor {
  return {
    name: ADMINISTRATION_MODULE,
    async initialize(infrastructure: SharedInfrastructure): Promise<ModuleHandle> {
      const logger = moduleLogger(infrastructure.logger, ADMINISTRATION_MODULE);
      const accessor = infrastructure.executionContextAccessor;
      const repository = await openStore(
        options.repository ?? new PostgresProposalRepository(createPool(infrastructure.connectionString)),
      );

      return {
        name: ADMINISTRATION_MODULE,
        policies: administrationPolicies,
        endpoints: [
          {
            method: "POST",
            url: "/administration/meeting-group-proposals",
            policy: "ProposeMeetingGroup",
            summary: "Propose a new meeting group",
            successStatus: 201,
            async handle({ body, context }) {
              const command = parseCommand(proposeMeetingGroupSchema, body);
              const userId = accessor.currentUserId(context);
              if (userId === null) {
                throw new UnauthorizedError();
              }
              const proposal = proposeMeetingGroup(command, userId);
              await repository.save(proposal);
              logger.info({ proposalId: proposal.id }, "Meeting group proposed");
              return { id: proposal.id };
            },
          },
          {
            method: "GET",
            url: "/administration/meeting-group-proposals",
            policy: "GetMeetingGroupProposals",
            summary: "List meeting group proposals",
            async handle() {
              const proposals = await repository.list();
              return { items: proposals.map(toProposalResponse) };
            },
          },
          {
            method: "POST",
            url: "/administration/meeting-group-proposals/:proposalId/accept",
            policy: "AcceptMeetingGroupProposal",
            summary: "Accept a meeting group proposal",
            successStatus: 204,
            async handle({ params, context }) {
              const parsedId = proposalIdSchema.safeParse(params["proposalId"]);
              const proposal = parsedId.success ? await repository.findById(parsedId.data) : null;
              if (!proposal) {
                throw new NotFoundError("Meeting group proposal not found");
              }
              const userId = accessor.currentUserId(context);
              if (userId === null) {
                throw new UnauthorizedError();
              }
              await repository.save(acceptProposal(proposal, userId));
              logger.info({ proposalId: proposal.id }, "Meeting group proposal accepted");
              return undefined;
            },
          },
        ],
        async close() {
          await repository.close?.();
        },
      };
    },
  };
}
