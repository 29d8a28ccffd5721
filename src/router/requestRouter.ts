import { RateLimiter, nowSeconds } from "../limiter/rateLimiter";
import { detectFromLocale, detectFromText } from "../classifier/language";
import { analyzeIntent, isCreatorQuestion } from "../classifier/intent";
import { CommandSpec, lookupCommand, parseCommand } from "./commands";
import { planPrompt } from "./templates";
import { getMessage, MessageVars } from "../utils/messages";
import {
  CommandInvocation,
  InboundMessage,
  Intent,
  Language,
} from "../types/message";
import {
  RateLimitResult,
  RouteOutcome,
  RouterDecision,
} from "../types/decision";

export interface RouterOptions {
  limiter: RateLimiter;
  /** Name given in identity answers and the status text. */
  creatorName: string;
  modelName: string;
}

/**
 * Admission + classification for one inbound message. Holds no state of its
 * own; the limiter is the only thing it mutates.
 */
export class RequestRouter {
  private readonly vars: MessageVars;

  constructor(private readonly options: RouterOptions) {
    this.vars = { creator: options.creatorName, model: options.modelName };
  }

  route(message: InboundMessage, now: number = nowSeconds()): RouteOutcome {
    const command = message.command ?? parseCommand(message.text);
    const entry = command ? lookupCommand(command.name) : undefined;

    if (command && entry) {
      return this.routeCommand(message, command, entry, now);
    }
    return this.routeFreeForm(message, now);
  }

  private routeCommand(
    message: InboundMessage,
    command: CommandInvocation,
    entry: CommandSpec,
    now: number
  ): RouteOutcome {
    const localeLanguage = detectFromLocale(message.locale);

    if (entry.kind === "info") {
      return {
        kind: "info",
        notice: {
          language: localeLanguage,
          text: getMessage(entry.message, localeLanguage, this.vars),
          parseMode: entry.parseMode,
        },
      };
    }

    const args = command.args.trim();
    if (!args) {
      return {
        kind: "usage",
        notice: {
          language: localeLanguage,
          text: getMessage(entry.usage, localeLanguage),
          parseMode: "plain",
        },
      };
    }

    const intent = entry.intent;
    return this.admit(message.userKey, localeLanguage, now, args, false, () => intent);
  }

  private routeFreeForm(message: InboundMessage, now: number): RouteOutcome {
    const text = message.text.trim();

    // identity answers are free: checked before the limiter is consulted
    if (isCreatorQuestion(text)) {
      const language = detectFromText(text);
      return {
        kind: "identity",
        notice: {
          language,
          text: getMessage("identity", language, this.vars),
          parseMode: "plain",
        },
      };
    }

    return this.admit(
      message.userKey,
      detectFromLocale(message.locale),
      now,
      text,
      true,
      () => {
        const analysis = analyzeIntent(text);
        console.log(
          `Message: ${text.slice(0, 50)}... | build request: ${analysis.buildRequest} (${analysis.signal})`
        );
        return analysis.buildRequest ? "general" : "ask";
      }
    );
  }

  /**
   * Consumes a limiter slot, then classifies. A denied message is never
   * classified.
   */
  private admit(
    userKey: string,
    localeLanguage: Language,
    now: number,
    text: string,
    freeForm: boolean,
    resolveIntent: () => Intent
  ): RouteOutcome {
    const rateLimit = this.options.limiter.consume(userKey, now);

    if (!rateLimit.allowed) {
      console.warn(`Rate limit exceeded for ${userKey}`);
      return {
        kind: "denied",
        notice: {
          language: localeLanguage,
          text: getMessage("rate_limit", localeLanguage),
          parseMode: "plain",
        },
        rateLimit,
        retryAfterSeconds: Math.max(0, Math.ceil(rateLimit.resetAt - now)),
      };
    }

    // the message text decides the language; the locale only localizes notices
    const language = detectFromText(text);
    return {
      kind: "allowed",
      decision: this.decide(text, language, resolveIntent(), freeForm, rateLimit),
    };
  }

  /**
   * Re-plans an admitted free-form message under the other handling path
   * (build request <-> question). Does not touch the limiter.
   */
  alternative(decision: RouterDecision): RouterDecision {
    const intent: Intent =
      decision.classification.intent === "ask" ? "general" : "ask";
    return this.decide(
      decision.text,
      decision.classification.language,
      intent,
      decision.freeForm,
      decision.rateLimit
    );
  }

  private decide(
    text: string,
    language: Language,
    intent: Intent,
    freeForm: boolean,
    rateLimit: RateLimitResult
  ): RouterDecision {
    const plan = planPrompt(intent, language, text, this.vars);
    return {
      allowed: true,
      classification: { language, intent },
      text,
      enhancedPrompt: plan.enhancedPrompt,
      systemInstruction: plan.systemInstruction,
      freeForm,
      rateLimit,
    };
  }
}
