import { describe, expect, it, vi } from "vitest";
import { Request, Response } from "express";
import {
  inboundMessageSchema,
  requireApiKey,
  toInboundMessage,
} from "../middleware/relay.middleware";

function fakeRequest(headers: Record<string, string | undefined>) {
  return {
    header: (name: string) => headers[name.toLowerCase()],
  } as unknown as Request;
}

function fakeResponse() {
  const res = {
    statusCode: 200,
    body: undefined as unknown,
    status(code: number) {
      res.statusCode = code;
      return res;
    },
    json(payload: unknown) {
      res.body = payload;
      return res;
    },
  };
  return res;
}

describe("requireApiKey", () => {
  it("passes requests carrying the configured token", () => {
    const next = vi.fn();
    const res = fakeResponse();

    requireApiKey("test-token")(
      fakeRequest({ "x-api-key": "test-token" }),
      res as unknown as Response,
      next
    );

    expect(next).toHaveBeenCalledTimes(1);
    expect(res.statusCode).toBe(200);
  });

  it("rejects a missing or wrong token", () => {
    for (const headers of [{}, { "x-api-key": "wrong" }]) {
      const next = vi.fn();
      const res = fakeResponse();

      requireApiKey("test-token")(
        fakeRequest(headers),
        res as unknown as Response,
        next
      );

      expect(next).not.toHaveBeenCalled();
      expect(res.statusCode).toBe(401);
      expect(res.body).toEqual({ message: "Invalid or missing API key" });
    }
  });
});

describe("inboundMessageSchema", () => {
  it("accepts a minimal message", () => {
    expect(inboundMessageSchema.safeParse({ userId: 42, text: "hi" }).success).toBe(true);
    expect(inboundMessageSchema.safeParse({ userId: "u-1", text: "hi" }).success).toBe(true);
  });

  it("rejects blank text", () => {
    expect(inboundMessageSchema.safeParse({ userId: 42, text: "   " }).success).toBe(false);
  });

  it("requires a usable user id", () => {
    for (const userId of [undefined, "  ", 1.5, Number.MAX_SAFE_INTEGER + 1]) {
      expect(inboundMessageSchema.safeParse({ userId, text: "hi" }).success).toBe(false);
    }
    expect(
      inboundMessageSchema.safeParse({ userId: Number.MAX_SAFE_INTEGER, text: "hi" })
        .success
    ).toBe(true);
  });

  it("defaults command args to an empty string", () => {
    const parsed = inboundMessageSchema.parse({
      userId: 42,
      text: "/code",
      command: { name: "code" },
    });
    expect(parsed.command).toEqual({ name: "code", args: "" });
  });
});

describe("toInboundMessage", () => {
  it("keys by user id and strips a leading slash from command names", () => {
    const body = inboundMessageSchema.parse({
      userId: 42,
      text: "/web shop",
      locale: "bn",
      command: { name: "/web", args: "shop" },
    });

    expect(toInboundMessage(body)).toEqual({
      userKey: "rl:user:42",
      text: "/web shop",
      locale: "bn",
      command: { name: "web", args: "shop" },
    });
  });

  it("trims string user ids", () => {
    const body = inboundMessageSchema.parse({ userId: " u-7 ", text: "hello" });

    expect(toInboundMessage(body).userKey).toBe("rl:user:u-7");
  });
});
