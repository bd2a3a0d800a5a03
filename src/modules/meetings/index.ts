import { z } from "zod";

import type { ModuleDescriptor, ModuleHandle, SharedInfrastructure } from "../../composition/module-descriptor.js";
import type { RequestContext } from "../../platform/request-context.js";
import type { MeetingRepository } from "./meeting-repository.js";

import { createPool, openStore } from "../../db/pool.js";
import { moduleLogger } from "../../platform/logger.js";
import { NotFoundError, UnauthorizedError } from "../../shared/errors.js";
import { parseCommand } from "../../shared/validation.js";
import { createMeetingSchema, ensureCanCancel, scheduleMeeting, toMeetingResponse } from "./meeting.js";
import { PostgresMeetingRepository } from "./meeting-repository.js";

export const MEETINGS_MODULE = "Meetings";

export const meetingsPolicies = {
  CreateMeeting: "meetings.create",
  GetMeeting: "meetings.read",
  CancelMeeting: "meetings.delete",
} as const;

const meetingIdSchema = z.string().uuid();

export interface MeetingsModuleOptions {
  repository?: MeetingRepository;
}

export function createMeetingsModule(options: MeetingsModuleOptions = {}): ModuleDescriptor {
  return {
    name: MEETINGS_MODULE,
    async initialize(infrastructure: SharedInfrastructure): Promise<ModuleHandle> {
      const logger = moduleLogger(infrastructure.logger, MEETINGS_MODULE);
      const accessor = infrastructure.executionContextAccessor;
      const repository = await openStore(
        options.repository ?? new PostgresMeetingRepository(createPool(infrastructure.connectionString)),
      );

      function requireUser(context: RequestContext): string {
        const userId = accessor.currentUserId(context);
        if (userId === null) {
          throw new UnauthorizedError();
        }
        return userId;
      }

      async function loadMeeting(id: string | undefined) {
        const parsedId = meetingIdSchema.safeParse(id);
        const meeting = parsedId.success ? await repository.findById(parsedId.data) : null;
        if (!meeting) {
          throw new NotFoundError("Meeting not found");
        }
        return meeting;
      }

      return {
        name: MEETINGS_MODULE,
        policies: meetingsPolicies,
        endpoints: [
          {
            method: "POST",
            url: "/meetings",
            policy: "CreateMeeting",
            summary: "Schedule a meeting",
            successStatus: 201,
            async handle({ body, context }) {
              const command = parseCommand(createMeetingSchema, body);
              const meeting = scheduleMeeting(command, requireUser(context));
              await repository.add(meeting);
              logger.info(
                { meetingId: meeting.id, correlationId: accessor.correlationId(context) },
                "Meeting scheduled",
              );
              return { id: meeting.id };
            },
          },
          {
            method: "GET",
            url: "/meetings/:meetingId",
            policy: "GetMeeting",
            summary: "Get meeting details",
            async handle({ params }) {
              return toMeetingResponse(await loadMeeting(params["meetingId"]));
            },
          },
          {
            method: "DELETE",
            url: "/meetings/:meetingId",
            policy: "CancelMeeting",
            summary: "Cancel a meeting",
            successStatus: 204,
            async handle({ params, context }) {
              const meeting = await loadMeeting(params["meetingId"]);
              ensureCanCancel(meeting, requireUser(context));
              await repository.remove(meeting.id);
              logger.info({ meetingId: meeting.id }, "Meeting cancelled");
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
