import { Express, Request, Response } from "express";
import type { ZodError } from "zod";
import { reprocessRequestSchema, summaryRequestSchema, turnRequestSchema } from "@shared/schema";
import { handleTurn, reprocessSms, type TurnResult } from "../ai";
import { buildCallSummary } from "../services/callSummary";
import type { Services } from "../services/serviceFactory";
import { env } from "../utils/env";
import { detectLanguage } from "../utils/language";

export function validationError(error: ZodError) {
  return {
    error: error.issues[0]?.message ?? "Invalid request",
    details: error.flatten(),
  };
}

function toWire(result: TurnResult, callSid?: string) {
  return {
    response_text: result.responseText,
    conversation_stage: result.nextStage,
    collected_info: result.facts,
    action: result.action,
    updated_history: result.history,
    requires_sms: result.requiresSms,
    company_requested: result.companyRequested,
    end_call: result.endCall,
    caller_role: result.callerRole,
    intent: result.intent,
    call_sid: callSid,
    conversation_summary: result.summary,
  };
}

function asksForReprocessing(body: unknown): boolean {
  return typeof body === "object" && body !== null && "requires_reprocessing" in body && body.requires_reprocessing === true;
}

/**
 * Conversation routes
 * One caller turn per request; the caller resends the full context each time.
 */
export function registerConversation(app: Express, services: Services) {

  /**
   * POST /generate
   * Turn processing, or SMS reprocessing when `requires_reprocessing` is set
   */
  app.post("/generate", async (req: Request, res: Response) => {
    try {
      if (asksForReprocessing(req.body)) {
        const parsed = reprocessRequestSchema.safeParse(req.body);
        if (!parsed.success) {
          return res.status(400).json(validationError(parsed.error));
        }
        const body = parsed.data;
        console.log(`[Conversation] Reprocessing ${body.sms_data.length} SMS for ${body.company ?? "unknown company"}`);

        const result = reprocessSms(
          {
            company: body.company,
            smsBatch: body.sms_data,
            facts: body.collected_info,
            history: body.history,
            language: body.response_language ?? env.DEFAULT_LANGUAGE,
          },
          services
        );
        return res.json(toWire(result, body.call_sid));
      }

      const parsed = turnRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        console.warn("[Conversation] Rejected turn:", parsed.error.issues[0]?.message);
        return res.status(400).json(validationError(parsed.error));
      }
      const body = parsed.data;

      const result = await handleTurn(
        {
          utterance: body.new_message,
          callerRole: body.caller_role,
          stage: body.conversation_stage,
          facts: body.collected_info,
          history: body.history,
          language: body.response_language ?? detectLanguage(body.new_message, env.DEFAULT_LANGUAGE),
          callerId: body.caller_id,
        },
        services
      );

      return res.json(toWire(result, body.call_sid));
    } catch (error) {
      console.error("[Conversation] Turn failed:", error);
      return res.status(500).json({ error: "Failed to process conversation turn" });
    }
  });

  /**
   * POST /api/conversation-summary
   */
  app.post("/api/conversation-summary", async (req: Request, res: Response) => {
    try {
      const parsed = summaryRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json(validationError(parsed.error));
      }
      const { history, collected_info, call_duration } = parsed.data;

      const summary = await buildCallSummary(history, collected_info, call_duration, services.languageModel);
      return res.json({
        success: true,
        summary: summary.summary,
        call_type: summary.callType,
        key_points: summary.keyPoints,
        formatted_duration: summary.formattedDuration,
        generated_at: summary.generatedAt,
      });
    } catch (error) {
      console.error("[Conversation] Summary failed:", error);
      return res.status(500).json({ error: "Failed to generate summary" });
    }
  });
}
