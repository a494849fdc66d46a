import { Express, Request, Response } from "express";
import { addOrderSchema, getOtpSchema, orderStatusUpdateSchema, type Order } from "@shared/schema";
import { requireSharedSecret } from "../middlewares/auth";
import { findBestMatch, parseBatch, suggestAlternatives } from "../services/otpExtraction";
import type { Services } from "../services/serviceFactory";
import { validationError } from "./conversation";

// Returned when the SMS backend cannot be reached; never a real code
export const PLACEHOLDER_OTP = "000000";

// OTPs leave the ledger only through /api/get-otp
function publicOrder(order: Order) {
  const { otp, ...rest } = order;
  return { ...rest, has_otp: Boolean(otp) };
}

/**
 * Order routes
 * Ledger admin (shared secret) and the OTP release endpoint
 */
export function registerOrders(app: Express, services: Services, internalSecret: string) {
  const { ledger } = services;
  const requireSecret = requireSharedSecret(internalSecret);

  /**
   * POST /add-order
   */
  app.post("/add-order", requireSecret, (req: Request, res: Response) => {
    const parsed = addOrderSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json(validationError(parsed.error));
    }
    const { company, otp, tracking_id } = parsed.data;

    const orderId = ledger.add(company, otp, tracking_id);
    return res.json({ success: true, order_id: orderId });
  });

  /**
   * GET /list-orders
   */
  app.get("/list-orders", (_req: Request, res: Response) => {
    const orders = ledger.list().map(publicOrder);
    res.json({ success: true, count: orders.length, orders });
  });

  /**
   * GET /api/orders/:orderId
   */
  app.get("/api/orders/:orderId", (req: Request, res: Response) => {
    const order = ledger.get(req.params.orderId ?? "");
    if (!order) {
      return res.status(404).json({ error: "Order not found" });
    }
    return res.json({ success: true, order: publicOrder(order) });
  });

  /**
   * POST /api/orders/:orderId/status
   * 409 when the ledger refuses the transition
   */
  app.post("/api/orders/:orderId/status", requireSecret, (req: Request, res: Response) => {
    const parsed = orderStatusUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json(validationError(parsed.error));
    }

    const orderId = req.params.orderId ?? "";
    const result = ledger.setStatus(orderId, parsed.data.status);
    if (!result.ok) {
      return res.status(result.order ? 409 : 404).json({ error: result.reason });
    }
    return res.json({ success: true, changed: result.changed, order: publicOrder(result.order) });
  });

  /**
   * POST /api/get-otp
   * Releases the OTP of an approved order: the stored one, or else the best
   * match in the owner's recent SMS.
   */
  app.post("/api/get-otp", async (req: Request, res: Response) => {
    const parsed = getOtpSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ success: false, ...validationError(parsed.error) });
    }
    const { company, orderId, userId } = parsed.data;

    const order = ledger.get(orderId);
    if (!order) {
      return res.status(404).json({ success: false, error: "Order not found" });
    }
    if (order.status !== "approved") {
      return res.status(403).json({ success: false, error: `Order is ${order.status}; the OTP is released only once approved` });
    }

    const stored = ledger.releaseOtp(orderId);
    if (stored) {
      ledger.setStatus(orderId, "completed");
      return res.json({ success: true, otp: stored, company: order.company, source: "ledger" });
    }

    try {
      const messages = await services.sms.fetchLatest(userId);
      const parsedMessages = parseBatch(messages, company);
      const best = findBestMatch(parsedMessages, company);

      if (!best || !best.match.otp) {
        return res.status(404).json({
          success: false,
          error: `No ${company} OTP found in recent messages`,
          alternatives: suggestAlternatives(parsedMessages),
        });
      }

      // The order may have moved on while the inbox was being read
      const done = ledger.setStatus(orderId, "completed");
      if (!done.ok || !done.changed) {
        const status = ledger.get(orderId)?.status ?? "gone";
        console.warn(`[Orders] Order ${orderId} is ${status} after the SMS lookup, OTP withheld`);
        return res.status(409).json({ success: false, error: `Order is ${status}; the OTP was not released` });
      }
      return res.json({
        success: true,
        otp: best.match.otp,
        company,
        source: "sms",
        confidence: best.match.confidence,
        fallback_used: best.fallbackUsed,
        tracking_id: best.match.trackingId,
      });
    } catch (error) {
      console.error("[Orders] SMS backend unavailable, returning placeholder OTP:", error);
      return res.json({ success: true, otp: PLACEHOLDER_OTP, company, source: "placeholder", placeholder: true });
    }
  });
}
