import { randomUUID } from "node:crypto";

import { z } from "zod";

export interface UserRegistration {
  id: string;
  login: string;
  /** Encrypted with the module's text encryption key. */
  encryptedEmail: string;
  firstName: string;
  lastName: string;
  registeredAt: Date;
  status: "waiting_for_confirmation" | "confirmed";
}

export const registerNewUserSchema = z.object({
  login: z
    .string()
    .trim()
    .min(3, "Login must have at least 3 characters")
    .max(50)
    .regex(/^[A-Za-z0-9._-]+$/, "Login may contain letters, digits, dots, dashes and underscores"),
  email: z.string().trim().email("Email is invalid"),
  firstName: z.string().trim().min(1, "First name is required").max(50),
  lastName: z.string().trim().min(1, "Last name is required").max(50),
});

export type RegisterNewUserCommand = z.output<typeof registerNewUserSchema>;

export function createRegistration(
  command: RegisterNewUserCommand,
  encryptedEmail: string,
  now = new Date(),
): UserRegistration {
  return {
    id: randomUUID(),
    login: command.login,
    encryptedEmail,
    firstName: command.firstName,
    lastName: command.lastName,
    registeredAt: now,
    status: "waiting_for_confirmation",
  };
}
