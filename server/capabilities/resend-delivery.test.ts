import { afterEach, describe, expect, it, vi } from "vitest";
import { ResendDelivery, toEmailStatus } from "./resend-delivery.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("toEmailStatus", () => {
  it("maps the delivery event and bounce reason", () => {
    expect(
      toEmailStatus({
        id: "email-1",
        to: ["ana@finly.test"],
        from: "sales@sender.test",
        subject: "Hi",
        last_event: "bounced",
        created_at: "2026-03-01T12:00:00.000Z",
        bounce: { message: "Mailbox does not exist" }
      })
    ).toEqual({
      id: "email-1",
      to: ["ana@finly.test"],
      from: "sales@sender.test",
      subject: "Hi",
      lastEvent: "bounced",
      createdAt: "2026-03-01T12:00:00.000Z",
      scheduledAt: undefined,
      reason: "Mailbox does not exist"
    });
  });

  it("treats unfamiliar events as unknown", () => {
    expect(toEmailStatus({ id: "email-2", to: "ben@paylane.test", last_event: "teleported" })).toMatchObject({
      to: ["ben@paylane.test"],
      lastEvent: "unknown"
    });
  });
});

describe("ResendDelivery", () => {
  it("sends a batch and returns one id per message", async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ data: [{ id: "email-1" }, { id: "email-2" }] }));
    vi.stubGlobal("fetch", fetchMock);

    const ids = await new ResendDelivery({ apiKey: "test-secret", timeoutMs: 1000 }).sendBatch([
      { from: "sales@sender.test", to: ["ana@finly.test"], subject: "Hi", text: "Hello" },
      { from: "sales@sender.test", to: ["ben@paylane.test"], subject: "Hi", text: "Hello" }
    ]);

    expect(ids).toEqual(["email-1", "email-2"]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.resend.com/emails/batch");
    expect(JSON.parse(init.body)).toEqual([
      { from: "sales@sender.test", to: ["ana@finly.test"], subject: "Hi", text: "Hello" },
      { from: "sales@sender.test", to: ["ben@paylane.test"], subject: "Hi", text: "Hello" }
    ]);
  });

  it("rejects a batch response with missing ids", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ data: [{ id: "email-1" }] })));

    await expect(
      new ResendDelivery({ apiKey: "test-secret", timeoutMs: 1000 }).sendBatch([
        { from: "sales@sender.test", to: ["ana@finly.test"], subject: "Hi", text: "Hello" },
        { from: "sales@sender.test", to: ["ben@paylane.test"], subject: "Hi", text: "Hello" }
      ])
    ).rejects.toThrow("Resend send_batch returned 1 ids for 2 messages");
  });

  it("reschedules with scheduled_at", async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ id: "email-1", object: "email" }));
    vi.stubGlobal("fetch", fetchMock);

    await new ResendDelivery({ apiKey: "test-secret", timeoutMs: 1000 }).updateEmail("email-1", {
      scheduledAt: "2026-03-03T09:00:00.000Z"
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.resend.com/emails/email-1");
    expect(init.method).toBe("PATCH");
    expect(JSON.parse(init.body)).toEqual({ scheduled_at: "2026-03-03T09:00:00.000Z" });
  });
});
