import { z } from "zod";

// ═══════════════════════════════════════════════
// Roles, languages, stages
// ═══════════════════════════════════════════════

export const callerRoleSchema = z.enum(["delivery", "unknown", "undetermined"]);
export type CallerRole = z.infer<typeof callerRoleSchema>;

export const languageSchema = z.enum(["en", "hi"]);
export type Language = z.infer<typeof languageSchema>;

export const DELIVERY_STAGES = [
  "start",
  "waiting_for_context",
  "initial_greeting",
  "asking_company_first",
  "asking_location_help",
  "getting_current_location",
  "traveling_to_location",
  "asking_company_for_otp",
  "asking_if_otp_needed",
  "asking_otp_company",
  "checking_sms",
  "otp_not_found",
  "manual_otp_entry",
  "confirming_manual_otp",
  "otp_provided",
  "call_ending",
  "end_of_call",
] as const;

export const UNKNOWN_STAGES = [
  "start",
  "asking_name",
  "asking_purpose",
  "asking_followup",
  "asking_second_followup",
  "collecting_contact",
  "end_of_call",
] as const;

export type DeliveryStage = (typeof DELIVERY_STAGES)[number];
export type UnknownStage = (typeof UNKNOWN_STAGES)[number];
export type Stage = DeliveryStage | UnknownStage;

const ALL_STAGES: readonly string[] = [...DELIVERY_STAGES, ...UNKNOWN_STAGES];

export function isDeliveryStage(stage: string): stage is DeliveryStage {
  return (DELIVERY_STAGES as readonly string[]).includes(stage);
}

export function isUnknownStage(stage: string): stage is UnknownStage {
  return (UNKNOWN_STAGES as readonly string[]).includes(stage);
}

/**
 * Whether `stage` belongs to the graph of `role`.
 * An undetermined caller can only be at the very start of a call.
 */
export function isStageOf(role: CallerRole, stage: string): boolean {
  switch (role) {
    case "delivery":
      return isDeliveryStage(stage);
    case "unknown":
      return isUnknownStage(stage);
    case "undetermined":
      return stage === "start";
  }
}

export function isStage(stage: string): stage is Stage {
  return ALL_STAGES.includes(stage);
}

export const stageSchema = z.string().refine(isStage, { message: "Unknown conversation stage" });

// ═══════════════════════════════════════════════
// Collaborator shapes
// ═══════════════════════════════════════════════

export const locationMatchSchema = z.object({
  name: z.string(),
  lat: z.number(),
  lng: z.number(),
  address: z.string(),
  distanceKm: z.number(),
});
export type LocationMatch = z.infer<typeof locationMatchSchema>;

export interface RouteSummary {
  steps: string[];
  distanceKm: number;
  etaMinutes: number;
}

export const importanceSchema = z.enum(["low", "medium", "high"]);
export type Importance = z.infer<typeof importanceSchema>;

export const followupPlanSchema = z.object({
  needsFollowup: z.boolean(),
  importance: importanceSchema,
  firstQuestion: z.string().optional(),
  secondQuestion: z.string().nullish().transform((v) => v ?? undefined),
  reasoning: z.string(),
});
export type FollowupPlan = z.infer<typeof followupPlanSchema>;

// ═══════════════════════════════════════════════
// Session context
// ═══════════════════════════════════════════════

export const factsSchema = z.object({
  name: z.string().optional(),
  phone: z.string().optional(),
  company: z.string().optional(),
  purpose: z.string().optional(),
  orderId: z.string().optional(),
  currentLocation: locationMatchSchema.optional(),
  additionalDetails: z.array(z.string()).optional(),
  followupPlan: followupPlanSchema.optional(),
  followupAsked: z.boolean().optional(),
  manualOtp: z.string().optional(),
  /** Unrecognized turns per stage, reset when the stage changes */
  stageAttempts: z.record(z.string(), z.number().int().nonnegative()).optional(),
});
export type Facts = z.infer<typeof factsSchema>;

/** The subset of facts the extractor is allowed to fill */
export type ExtractedFacts = Pick<Facts, "name" | "purpose" | "phone" | "company">;

export const historyTurnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
});
export type HistoryTurn = z.infer<typeof historyTurnSchema>;

// ═══════════════════════════════════════════════
// Orders
// ═══════════════════════════════════════════════

export const orderStatusSchema = z.enum(["pending", "approved", "completed", "denied"]);
export type OrderStatus = z.infer<typeof orderStatusSchema>;

export interface Order {
  orderId: string;
  company: string;
  otp?: string;
  trackingId?: string;
  status: OrderStatus;
  createdAt: string;
  updatedAt: string;
}

// ═══════════════════════════════════════════════
// SMS
// ═══════════════════════════════════════════════

export const smsMessageSchema = z.object({
  sender: z.string().default(""),
  message: z.string().default(""),
  timestamp: z.string().optional(),
});
export type SmsMessage = z.infer<typeof smsMessageSchema>;

export interface ParsedMessage {
  rawText: string;
  sender: string;
  otp?: string;
  trackingId?: string;
  companyGuess?: string;
  /** Heuristic in [0, 1] */
  confidence: number;
}

// ═══════════════════════════════════════════════
// Side effects
// ═══════════════════════════════════════════════

export type SideEffectAction =
  | { type: "none" }
  | { type: "request_sms_otp"; company: string }
  | { type: "urgent_notification"; message: string }
  | { type: "provide_otp"; otp: string; company: string };

export const NO_ACTION: SideEffectAction = { type: "none" };

// ═══════════════════════════════════════════════
// HTTP request bodies
// ═══════════════════════════════════════════════

export const turnRequestSchema = z.object({
  new_message: z
    .string({ required_error: "'new_message' is required" })
    .trim()
    .min(1, "'new_message' is required"),
  caller_role: z
    .string()
    .optional()
    .transform((r): CallerRole => (r === "delivery" || r === "unknown" ? r : "undetermined")),
  conversation_stage: stageSchema.default("start"),
  history: z.array(historyTurnSchema).nullish().transform((h) => h ?? []),
  collected_info: factsSchema.nullish().transform((f) => f ?? {}),
  response_language: languageSchema.optional(),
  caller_id: z.string().optional(),
  call_sid: z.string().optional(),
});
export type TurnRequest = z.infer<typeof turnRequestSchema>;

export const reprocessRequestSchema = z.object({
  requires_reprocessing: z.literal(true),
  call_sid: z.string().optional(),
  company: z.string().optional(),
  sms_data: z.array(smsMessageSchema).nullish().transform((s) => s ?? []),
  collected_info: factsSchema.nullish().transform((f) => f ?? {}),
  history: z.array(historyTurnSchema).nullish().transform((h) => h ?? []),
  response_language: languageSchema.optional(),
});
export type ReprocessRequest = z.infer<typeof reprocessRequestSchema>;

export const addOrderSchema = z.object({
  company: z.string().trim().min(1, "Missing 'company'"),
  otp: z.string().trim().min(1, "Missing 'otp'"),
  tracking_id: z.string().optional(),
});

export const orderStatusUpdateSchema = z.object({
  status: orderStatusSchema,
});

export const getOtpSchema = z.object({
  company: z.string().trim().min(1),
  orderId: z.string().trim().min(1),
  userId: z.string().optional(),
});

export const summaryRequestSchema = z.object({
  history: z.array(historyTurnSchema).min(1, "No conversation history provided"),
  collected_info: factsSchema.nullish().transform((f) => f ?? {}),
  call_duration: z.number().optional(),
});
