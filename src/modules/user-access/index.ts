import type { ModuleDescriptor, ModuleHandle, SharedInfrastructure } from "../../composition/module-descriptor.js";
import type { RegistrationRepository } from "./registration-repository.js";

import { claimValues, PERMISSION_CLAIM_TYPE } from "../../access/principal.js";
import { createPool, openStore } from "../../db/pool.js";
import { moduleLogger } from "../../platform/logger.js";
import { BusinessRuleViolationError, UnauthorizedError } from "../../shared/errors.js";
import { parseCommand } from "../../shared/validation.js";
import { PostgresRegistrationRepository } from "./registration-repository.js";
import { TextEncryptor } from "./text-encryptor.js";
import { createRegistration, registerNewUserSchema } from "./user-registration.js";

export const USER_ACCESS_MODULE = "UserAccess";

export const userAccessPolicies = {
  RegisterNewUser: "users.register",
  GetAuthenticatedUser: "users.read-self",
} as const;

export interface UserAccessModuleOptions {
  repository?: RegistrationRepository;
}

export function createUserAccessModule(options: UserAccessModuleOptions = {}): ModuleDescriptor {
  return {
    name: USER_ACCESS_MODULE,
    async initialize(infrastructure: SharedInfrastructure): Promise<ModuleHandle> {
      const textEncryptionKey = infrastructure.security.textEncryptionKey;
      if (!textEncryptionKey) {
        throw new Error("SECURITY_TEXT_ENCRYPTION_KEY is required by the user access module");
      }
      const encryptor = new TextEncryptor(textEncryptionKey);

      const logger = moduleLogger(infrastructure.logger, USER_ACCESS_MODULE);
      const accessor = infrastructure.executionContextAccessor;
      const emailSender = infrastructure.emailSender;
      const repository = await openStore(
        options.repository ?? new PostgresRegistrationRepository(createPool(infrastructure.connectionString)),
      );

      return {
        name: USER_ACCESS_MODULE,
        policies: userAccessPolicies,
        endpoints: [
          {
            method: "POST",
            url: "/user-access/registrations",
            policy: "RegisterNewUser",
            summary: "Register a new user",
            successStatus: 201,
            async handle({ body }) {
              const command = parseCommand(registerNewUserSchema, body);
              if ((await repository.countByLogin(command.login)) > 0) {
                throw new BusinessRuleViolationError("UserLoginMustBeUnique", `Login ${command.login} is already taken`);
              }

              const registration = createRegistration(command, encryptor.encrypt(command.email));
              await repository.add(registration);
              await emailSender.send({
                to: command.email,
                subject: "Confirm your registration",
                content: `Welcome ${command.firstName}, confirm your registration with code ${registration.id}.`,
              });
              logger.info({ registrationId: registration.id }, "User registered");
              return { id: registration.id };
            },
          },
          {
            method: "GET",
            url: "/user-access/authenticated-user",
            policy: "GetAuthenticatedUser",
            summary: "Describe the calling user",
            async handle({ context }) {
              const userId = accessor.currentUserId(context);
              if (userId === null || !context.principal) {
                throw new UnauthorizedError();
              }
              return {
                user_id: userId,
                permissions: claimValues(context.principal, PERMISSION_CLAIM_TYPE),
              };
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
