import { RequestRouter } from "../router/requestRouter";
import { TextGenerator, GenerationMode } from "./generator";
import { splitMessage } from "./chunker";
import { cleanCodeResponse, formatCodeResponse } from "./formatter";
import { getMessage } from "../utils/messages";
import { describeError } from "../utils/errors";
import {
  recordAllowed,
  recordBlocked,
  recordGenerationError,
  recordIdentityAnswer,
  recordUsageError,
} from "../utils/metrics";
import { Intent, InboundMessage, Language, Reply } from "../types/message";
import { Notice, RateLimitResult, RouterDecision } from "../types/decision";

export type RelayOutcome =
  | "identity"
  | "info"
  | "usage"
  | "denied"
  | "answered"
  | "failed";

export interface RelayResult {
  outcome: RelayOutcome;
  language: Language;
  intent?: Intent;
  replies: Reply[];
  rateLimit?: RateLimitResult;
  retryAfterSeconds?: number;
}

export interface RelayServiceOptions {
  router: RequestRouter;
  generator: TextGenerator;
  maxChunkLength: number;
}

function modeOf(intent: Intent): GenerationMode {
  return intent === "ask" ? "question" : "build";
}

/**
 * Full handling of one inbound message: admission and classification, the
 * generation call, then reply post-processing and chunking.
 */
export class RelayService {
  constructor(private readonly options: RelayServiceOptions) {}

  async handle(message: InboundMessage, now?: number): Promise<RelayResult> {
    const route = this.options.router.route(message, now);

    switch (route.kind) {
      case "identity":
        recordIdentityAnswer();
        return this.noticeResult("identity", route.notice);
      case "info":
        return this.noticeResult("info", route.notice);
      case "usage":
        recordUsageError();
        return this.noticeResult("usage", route.notice);
      case "denied":
        recordBlocked();
        return {
          ...this.noticeResult("denied", route.notice),
          rateLimit: route.rateLimit,
          retryAfterSeconds: route.retryAfterSeconds,
        };
      case "allowed":
        recordAllowed();
        return this.answer(route.decision);
    }
  }

  /**
   * One generation attempt; free-form text gets a second attempt down the
   * other path. Neither attempt consumes another limiter slot.
   */
  private async answer(decision: RouterDecision): Promise<RelayResult> {
    const attempts = decision.freeForm
      ? [decision, this.options.router.alternative(decision)]
      : [decision];

    for (const attempt of attempts) {
      const { intent } = attempt.classification;
      try {
        const text = await this.options.generator.generate({
          prompt: attempt.enhancedPrompt,
          systemInstruction: attempt.systemInstruction,
          mode: modeOf(intent),
        });

        return {
          outcome: "answered",
          language: attempt.classification.language,
          intent,
          replies: this.toReplies(text, modeOf(intent)),
          rateLimit: decision.rateLimit,
        };
      } catch (err) {
        recordGenerationError();
        console.error(`Generation failed (${intent}):`, describeError(err));
      }
    }

    const { language, intent } = decision.classification;
    return {
      outcome: "failed",
      language,
      intent,
      replies: this.chunk(getMessage("error", language), "plain"),
      rateLimit: decision.rateLimit,
    };
  }

  private toReplies(text: string, mode: GenerationMode): Reply[] {
    if (mode === "question") {
      return this.chunk(text, "plain");
    }
    return this.chunk(formatCodeResponse(cleanCodeResponse(text)), "markdown");
  }

  private chunk(text: string, parseMode: Reply["parseMode"]): Reply[] {
    return splitMessage(text, this.options.maxChunkLength).map((part) => ({
      text: part,
      parseMode,
    }));
  }

  private noticeResult(outcome: RelayOutcome, notice: Notice): RelayResult {
    return {
      outcome,
      language: notice.language,
      replies: this.chunk(notice.text, notice.parseMode),
    };
  }
}
