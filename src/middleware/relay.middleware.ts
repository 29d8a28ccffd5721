import { timingSafeEqual } from "crypto";
import { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { RelayResult, RelayService } from "../relay/relayService";
import { getRateLimitKey } from "../utils/identifier";
import { InboundMessage } from "../types/message";
import { RateLimitPolicy } from "../types/policy";

export const inboundMessageSchema = z.object({
  userId: z.union([z.string().trim().min(1), z.number().int().safe()]),
  text: z.string().refine((value) => value.trim() !== "", "text cannot be empty"),
  locale: z.string().optional(),
  command: z
    .object({
      name: z.string().trim().min(1),
      args: z.string().default(""),
    })
    .optional(),
});

export type InboundMessageBody = z.infer<typeof inboundMessageSchema>;

function tokensMatch(presented: string, expected: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** Only the configured chat transport may submit messages. */
export function requireApiKey(expectedToken: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const presented = req.header("x-api-key");

    if (!presented || !tokensMatch(presented, expectedToken)) {
      return res.status(401).json({ message: "Invalid or missing API key" });
    }
    next();
  };
}

export function toInboundMessage(body: InboundMessageBody): InboundMessage {
  return {
    userKey: getRateLimitKey(body.userId),
    text: body.text,
    locale: body.locale,
    command: body.command
      ? { name: body.command.name.replace(/^\//, ""), args: body.command.args }
      : undefined,
  };
}

export function relayMessage(service: RelayService, policy: RateLimitPolicy) {
  return async (req: Request, res: Response, next: NextFunction) => {
    const parsed = inboundMessageSchema.safeParse(req.body);

    if (!parsed.success) {
      return res.status(400).json({
        message: "Invalid message",
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      });
    }

    try {
      const result = await service.handle(toInboundMessage(parsed.data));
      setHeaders(res, policy, result);
      res.json(result);
    } catch (err) {
      next(err);
    }
  };
}

function setHeaders(res: Response, policy: RateLimitPolicy, result: RelayResult) {
  if (result.rateLimit) {
    res.setHeader("X-RateLimit-Limit", policy.limit);
    res.setHeader("X-RateLimit-Remaining", result.rateLimit.remaining);
    res.setHeader("X-RateLimit-Reset", Math.ceil(result.rateLimit.resetAt));
  }
  if (result.retryAfterSeconds !== undefined) {
    res.setHeader("Retry-After", result.retryAfterSeconds);
  }
}
