import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { ModuleDescriptor } from "../src/composition/module-descriptor.js";

import { buildApp } from "../src/app.js";
import { createAdministrationModule } from "../src/modules/administration/index.js";
import { InMemoryProposalRepository } from "../src/modules/administration/proposal-repository.js";
import { createMeetingsModule } from "../src/modules/meetings/index.js";
import { InMemoryMeetingRepository } from "../src/modules/meetings/meeting-repository.js";
import { createPaymentsModule } from "../src/modules/payments/index.js";
import { createUserAccessModule } from "../src/modules/user-access/index.js";
import { InMemoryRegistrationRepository } from "../src/modules/user-access/registration-repository.js";
import { ConfigurationError, ModuleInitializationError } from "../src/shared/errors.js";
import { capturingLogger, signToken, silentLogger, testRawConfig } from "./support.js";

function inMemoryModules(): ModuleDescriptor[] {
  return [
    createMeetingsModule({ repository: new InMemoryMeetingRepository() }),
    createAdministrationModule({ repository: new InMemoryProposalRepository() }),
    createUserAccessModule({ repository: new InMemoryRegistrationRepository() }),
    createPaymentsModule(),
  ];
}

const meetingBody = {
  title: "Architecture sync",
  startsAt: "2026-11-02T10:00:00Z",
  endsAt: "2026-11-02T11:00:00Z",
  attendeesLimit: 2,
  attendees: ["usr_b"],
};

type App = Awaited<ReturnType<typeof buildApp>>;

describe("HTTP API", () => {
  let app: App;

  beforeEach(async () => {
    app = await buildApp({ logger: silentLogger(), rawConfig: testRawConfig(), modules: inMemoryModules() });
  });

  afterEach(async () => {
    await app.close();
  });

  it("serves health checks anonymously", async () => {
    const response = await app.inject({ method: "GET", url: "/api/v1/healthz" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: "ok" });
  });

  it("lists the composed modules in the readiness check", async () => {
    const response = await app.inject({ method: "GET", url: "/api/v1/readyz" });

    expect(response.json()).toEqual({
      status: "ready",
      modules: ["Meetings", "Administration", "UserAccess", "Payments"],
    });
  });

  it("rejects a request without a bearer token", async () => {
    const response = await app.inject({ method: "POST", url: "/api/v1/meetings", payload: meetingBody });

    expect(response.statusCode).toBe(401);
    expect(response.headers["content-type"]).toContain("application/problem+json");
    expect(response.json()).toEqual({
      type: "about:blank",
      title: "Unauthorized",
      status: 401,
      detail: "Unauthorized",
      instance: "/api/v1/meetings",
    });
  });

  it("rejects an invalid token", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/api/v1/meetings",
      headers: { authorization: "Bearer fake" },
      payload: meetingBody,
    });

    expect(response.statusCode).toBe(401);
  });

  it("rejects tokens for another audience, signed with another key or expired", async () => {
    const tokens = await Promise.all([
      signToken("usr_a", ["meetings.create"], { audience: "other-api" }),
      signToken("usr_a", ["meetings.create"], { secret: "another-test-signing-secret" }),
      signToken("usr_a", ["meetings.create"], { expiresIn: Math.floor(Date.now() / 1000) - 60 }),
    ]);

    for (const token of tokens) {
      const response = await app.inject({
        method: "POST",
        url: "/api/v1/meetings",
        headers: { authorization: `Bearer ${token}` },
        payload: meetingBody,
      });
      expect(response.statusCode).toBe(401);
    }
  });

  it("creates a meeting when the caller holds meetings.create", async () => {
    const token = await signToken("usr_a", ["meetings.create", "meetings.read"]);

    const created = await app.inject({
      method: "POST",
      url: "/api/v1/meetings",
      headers: { authorization: `Bearer ${token}` },
      payload: meetingBody,
    });

    expect(created.statusCode).toBe(201);
    const { id } = created.json() as { id: string };

    const fetched = await app.inject({
      method: "GET",
      url: `/api/v1/meetings/${id}`,
      headers: { authorization: `Bearer ${token}` },
    });

    expect(fetched.statusCode).toBe(200);
    expect(fetched.json()).toEqual({
      id,
      title: "Architecture sync",
      description: null,
      organizer_id: "usr_a",
      starts_at: "2026-11-02T10:00:00.000Z",
      ends_at: "2026-11-02T11:00:00.000Z",
      attendees_limit: 2,
      attendees: ["usr_b"],
    });
  });

  it("forbids an endpoint whose permission the caller lacks", async () => {
    const token = await signToken("usr_a", ["meetings.create"]);

    const response = await app.inject({
      method: "DELETE",
      url: "/api/v1/meetings/7f1d5a52-3a8e-4a4e-9d1b-3c2f0f6a1b2c",
      headers: { authorization: `Bearer ${token}` },
    });

    expect(response.statusCode).toBe(403);
    expect(response.json()).toMatchObject({ status: 403, title: "Forbidden" });
  });

  it("returns field errors for an invalid command", async () => {
    const token = await signToken("usr_a", ["meetings.create"]);

    const response = await app.inject({
      method: "POST",
      url: "/api/v1/meetings",
      headers: { authorization: `Bearer ${token}` },
      payload: { ...meetingBody, title: "   " },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      type: "/problems/validation-error",
      title: "Command validation error",
      status: 400,
      detail: "Command validation failed",
      instance: "/api/v1/meetings",
      errors: { title: ["Meeting title is required"] },
    });
  });

  it("returns a rule code when the attendee limit is exceeded", async () => {
    const token = await signToken("usr_a", ["meetings.create"]);

    const response = await app.inject({
      method: "POST",
      url: "/api/v1/meetings",
      headers: { authorization: `Bearer ${token}` },
      payload: { ...meetingBody, attendees: ["usr_b", "usr_c", "usr_d"] },
    });

    expect(response.statusCode).toBe(409);
    const body = response.json() as Record<string, unknown>;
    expect(body["code"]).toBe("MeetingAttendeesNumberMustBeWithinLimit");
    expect(body["detail"]).toBe("Meeting allows at most 2 attendees, got 3");
    expect(body["errors"]).toBeUndefined();
  });

  it("rejects a meeting that ends before it starts", async () => {
    const token = await signToken("usr_a", ["meetings.create"]);

    const response = await app.inject({
      method: "POST",
      url: "/api/v1/meetings",
      headers: { authorization: `Bearer ${token}` },
      payload: { ...meetingBody, startsAt: "2026-11-02T11:00:00Z", endsAt: "2026-11-02T10:00:00Z" },
    });

    expect(response.statusCode).toBe(409);
    const body = response.json() as Record<string, unknown>;
    expect(body["code"]).toBe("MeetingTermMustBeValid");
    expect(body["detail"]).toBe("Meeting must start before it ends");
  });

  it("lets only the organizer cancel a meeting", async () => {
    const organizer = await signToken("usr_a", ["meetings.create", "meetings.read", "meetings.delete"]);
    const stranger = await signToken("usr_z", ["meetings.delete"]);

    const created = await app.inject({
      method: "POST",
      url: "/api/v1/meetings",
      headers: { authorization: `Bearer ${organizer}` },
      payload: meetingBody,
    });
    const { id } = created.json() as { id: string };

    const byStranger = await app.inject({
      method: "DELETE",
      url: `/api/v1/meetings/${id}`,
      headers: { authorization: `Bearer ${stranger}` },
    });
    expect(byStranger.statusCode).toBe(409);
    expect(byStranger.json()).toMatchObject({ code: "OnlyOrganizerCanCancelMeeting" });

    const byOrganizer = await app.inject({
      method: "DELETE",
      url: `/api/v1/meetings/${id}`,
      headers: { authorization: `Bearer ${organizer}` },
    });
    expect(byOrganizer.statusCode).toBe(204);

    const afterwards = await app.inject({
      method: "GET",
      url: `/api/v1/meetings/${id}`,
      headers: { authorization: `Bearer ${organizer}` },
    });
    expect(afterwards.statusCode).toBe(404);
    expect(afterwards.json()).toMatchObject({ status: 404, detail: "Meeting not found" });
  });

  it("answers unknown meeting ids with not found", async () => {
    const token = await signToken("usr_a", ["meetings.read"]);

    const response = await app.inject({
      method: "GET",
      url: "/api/v1/meetings/not-a-uuid",
      headers: { authorization: `Bearer ${token}` },
    });

    expect(response.statusCode).toBe(404);
  });

  it("echoes the correlation id", async () => {
    const withHeader = await app.inject({
      method: "GET",
      url: "/api/v1/healthz",
      headers: { "x-correlation-id": "corr-123" },
    });
    const withoutHeader = await app.inject({ method: "GET", url: "/api/v1/healthz" });

    expect(withHeader.headers["x-correlation-id"]).toBe("corr-123");
    expect(withoutHeader.headers["x-correlation-id"]).toEqual(expect.any(String));
  });

  it("describes the authenticated user", async () => {
    const token = await signToken("usr_a", ["users.read-self", "meetings.read"]);

    const response = await app.inject({
      method: "GET",
      url: "/api/v1/user-access/authenticated-user",
      headers: { authorization: `Bearer ${token}` },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ user_id: "usr_a", permissions: ["users.read-self", "meetings.read"] });
  });

  it("registers a user once per login", async () => {
    const token = await signToken("usr_admin", ["users.register"]);
    const registration = { login: "jdoe", email: "jdoe@example.test", firstName: "Jane", lastName: "Doe" };

    const first = await app.inject({
      method: "POST",
      url: "/api/v1/user-access/registrations",
      headers: { authorization: `Bearer ${token}` },
      payload: registration,
    });
    const second = await app.inject({
      method: "POST",
      url: "/api/v1/user-access/registrations",
      headers: { authorization: `Bearer ${token}` },
      payload: { ...registration, login: "JDoe" },
    });

    expect(first.statusCode).toBe(201);
    expect(second.statusCode).toBe(409);
    expect(second.json()).toMatchObject({ code: "UserLoginMustBeUnique" });
  });

  it("accepts a meeting group proposal only once", async () => {
    const token = await signToken("usr_admin", [
      "administration.proposals.create",
      "administration.proposals.read",
      "administration.proposals.accept",
    ]);
    const headers = { authorization: `Bearer ${token}` };

    const proposed = await app.inject({
      method: "POST",
      url: "/api/v1/administration/meeting-group-proposals",
      headers,
      payload: { name: "Board gamers", city: "Warsaw", countryCode: "pl" },
    });
    expect(proposed.statusCode).toBe(201);
    const { id } = proposed.json() as { id: string };

    const accepted = await app.inject({
      method: "POST",
      url: `/api/v1/administration/meeting-group-proposals/${id}/accept`,
      headers,
    });
    const acceptedAgain = await app.inject({
      method: "POST",
      url: `/api/v1/administration/meeting-group-proposals/${id}/accept`,
      headers,
    });
    const listed = await app.inject({
      method: "GET",
      url: "/api/v1/administration/meeting-group-proposals",
      headers,
    });

    expect(accepted.statusCode).toBe(204);
    expect(acceptedAgain.statusCode).toBe(409);
    expect(acceptedAgain.json()).toMatchObject({ code: "MeetingGroupProposalCanBeAcceptedOnlyOnce" });
    const { items } = listed.json() as { items: Array<Record<string, unknown>> };
    expect(items).toHaveLength(1);
    expect(items[0]).toMatchObject({
      id,
      name: "Board gamers",
      country_code: "PL",
      status: "accepted",
      proposed_by: "usr_admin",
      decided_by: "usr_admin",
    });
  });

  it("filters the price list by country", async () => {
    const token = await signToken("usr_a", ["payments.price-list.read"]);

    const response = await app.inject({
      method: "GET",
      url: "/api/v1/payments/price-list?countryCode=us",
      headers: { authorization: `Bearer ${token}` },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      items: [
        { subscription_period: "Month", category: "New", country_code: "US", amount: 15, currency: "USD" },
        { subscription_period: "HalfYear", category: "New", country_code: "US", amount: 80, currency: "USD" },
      ],
    });
  });

  it("answers unknown routes with a problem payload", async () => {
    const response = await app.inject({ method: "GET", url: "/api/v1/nothing-here" });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      type: "about:blank",
      title: "Not Found",
      status: 404,
      detail: "No route for GET /api/v1/nothing-here",
      instance: "/api/v1/nothing-here",
    });
  });
});

describe("authorization gate", () => {
  it("never runs module code for rejected requests", async () => {
    const handle = vi.fn(async () => ({ ok: true }));
    const probe: ModuleDescriptor = {
      name: "Probe",
      initialize: () => ({
        name: "Probe",
        policies: { RunProbe: "probe.run" },
        endpoints: [{ method: "GET", url: "/probe", policy: "RunProbe", handle }],
      }),
    };
    const app = await buildApp({ logger: silentLogger(), rawConfig: testRawConfig(), modules: [probe] });

    const anonymous = await app.inject({ method: "GET", url: "/api/v1/probe" });
    const unauthorized = await app.inject({
      method: "GET",
      url: "/api/v1/probe",
      headers: { authorization: `Bearer ${await signToken("usr_a", ["probe.read"])}` },
    });
    expect(anonymous.statusCode).toBe(401);
    expect(unauthorized.statusCode).toBe(403);
    expect(handle).not.toHaveBeenCalled();

    const authorized = await app.inject({
      method: "GET",
      url: "/api/v1/probe",
      headers: { authorization: `Bearer ${await signToken("usr_a", ["probe.run"])}` },
    });
    expect(authorized.statusCode).toBe(200);
    expect(authorized.json()).toEqual({ ok: true });
    expect(handle).toHaveBeenCalledTimes(1);

    await app.close();
  });
});

describe("buildApp start-up", () => {
  it("fails when a module cannot initialize", async () => {
    const modules = [
      createMeetingsModule({ repository: new InMemoryMeetingRepository() }),
      createUserAccessModule({ repository: new InMemoryRegistrationRepository() }),
    ];

    await expect(
      buildApp({
        logger: silentLogger(),
        rawConfig: testRawConfig({ SECURITY_TEXT_ENCRYPTION_KEY: undefined }),
        modules,
      }),
    ).rejects.toBeInstanceOf(ModuleInitializationError);
  });

  it("fails when required configuration is missing", async () => {
    await expect(
      buildApp({
        logger: silentLogger(),
        rawConfig: testRawConfig({ AUTH_AUTHORITY: undefined }),
        modules: inMemoryModules(),
      }),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("fails when two modules declare the same policy", async () => {
    const close = vi.fn().mockResolvedValue(undefined);
    const duplicate: ModuleDescriptor = {
      name: "Duplicate",
      initialize: () => ({
        name: "Duplicate",
        policies: { GetPriceList: "payments.price-list.read" },
        endpoints: [],
        close,
      }),
    };
    const { logger, lines } = capturingLogger();

    await expect(
      buildApp({
        logger,
        rawConfig: testRawConfig(),
        modules: [createPaymentsModule(), duplicate],
      }),
    ).rejects.toThrow("Policy GetPriceList is already registered");
    expect(close).toHaveBeenCalledTimes(1);
    expect(lines.filter((line) => line.msg === "Failed to close the API host after a start-up error")).toEqual([]);
  });
});
