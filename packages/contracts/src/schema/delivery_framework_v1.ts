// packages/contracts/src/schema/delivery_framework_v1.ts
import { z } from "zod";

/**
 * DeliveryFrameworkV1
 * -------------------
 * Scoring regime of a project-week.
 * - planned: schedule / EVM driven (waterfall style)
 * - kanban: flow driven (throughput, cycle time, WIP)
 */
export const DeliveryFrameworkV1 = z.enum(["planned", "kanban"]);

export type DeliveryFrameworkV1 = z.infer<typeof DeliveryFrameworkV1>;

export const DEFAULT_DELIVERY_FRAMEWORK: DeliveryFrameworkV1 = "planned";

// Input is case-insensitive; a missing tag means "planned".
export const DeliveryFrameworkInputV1 = z.preprocess((v) => {
  if (v === undefined || v === null) return DEFAULT_DELIVERY_FRAMEWORK;
  if (typeof v !== "string") return v;
  const s = v.trim().toLowerCase();
  return s === "" ? DEFAULT_DELIVERY_FRAMEWORK : s;
}, DeliveryFrameworkV1);
