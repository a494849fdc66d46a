import { Express, Request, Response } from "express";
import { z } from "zod";
import { smsMessageSchema } from "@shared/schema";
import { requireSharedSecret } from "../middlewares/auth";
import {
  extractDeliveryDetails,
  findBestMatch,
  parseBatch,
  suggestAlternatives,
} from "../services/otpExtraction";
import { validationError } from "./conversation";

const SAMPLE_MESSAGES = [
  { sender: "VM-ZOMATO", message: "Your Zomato order OTP is 4821. Order ID: ZMT123456789" },
  { sender: "AD-SWIGGY", message: "Swiggy: Share code 5530 with your delivery partner Ravi. Arriving in 10 mins" },
  { sender: "AX-AMAZON", message: "Your Amazon delivery PIN is 667012. Tracking ID AMZN12345678901" },
  { sender: "HDFCBK", message: "Use 889911 as your one time password for login" },
];

const testParsingSchema = z.object({
  company: z.string().optional(),
  messages: z.array(smsMessageSchema).optional(),
});

/**
 * Admin routes
 * Lets the owner check what the OTP parser makes of a batch of SMS
 */
export function registerAdmin(app: Express, internalSecret: string) {

  /**
   * POST /api/admin/test-sms-parsing
   */
  app.post("/api/admin/test-sms-parsing", requireSharedSecret(internalSecret), (req: Request, res: Response) => {
    const parsed = testParsingSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json(validationError(parsed.error));
    }

    const company = parsed.data.company ?? "";
    const messages = parsed.data.messages?.length ? parsed.data.messages : SAMPLE_MESSAGES;
    const results = parseBatch(messages, company || undefined);
    const best = findBestMatch(results, company);

    console.log(`[Admin] Parsed ${results.length} messages for "${company || "any company"}"`);

    return res.json({
      success: true,
      company: company || null,
      results: results.map(result => ({
        ...result,
        delivery_details: extractDeliveryDetails(result.rawText),
      })),
      best_match: best ? { ...best.match, score: best.score, fallback_used: best.fallbackUsed } : null,
      alternatives: suggestAlternatives(results),
    });
  });
}
