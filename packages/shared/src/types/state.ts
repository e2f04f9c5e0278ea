import { z } from "zod";

export const RESOURCE_KINDS = ["container", "identity_registration", "configuration_applied"] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

export const deploymentRecordSchema = z.object({
  fingerprint: z.string().min(1),
  updated_at: z.string().datetime(),
  outputs: z.record(z.string()).optional(),
});

export const stateDocumentSchema = z.object({
  version: z.literal(1),
  updated_at: z.string().datetime().nullable(),
  services: z.record(z.record(z.enum(RESOURCE_KINDS), deploymentRecordSchema)),
});

export type DeploymentRecord = z.infer<typeof deploymentRecordSchema>;
export type StateDocument = z.infer<typeof stateDocumentSchema>;

export type HealthStatus = "healthy" | "unhealthy";

// Last-known probe result for a service
export interface HealthObservation {
  service: string;
  status: HealthStatus;
  reason?: string;
  attempts: number;
  checkedAt: string;
}
