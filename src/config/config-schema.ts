import { z } from "zod";
import type { SupervisorConfig } from "../types/config.js";

const positiveMs = z.number().int().positive();
const nonEmpty = z.string().min(1);

const commandSpec = z
  .object({
    command: nonEmpty,
    args: z.array(z.string()).optional(),
    env: z.record(z.string()).optional(),
  })
  .strict();

export const supervisorConfigSchema: z.ZodType<SupervisorConfig> = z
  .object({
    // Identity
    robotName: nonEmpty.regex(/^[A-Za-z0-9_/-]+$/, "must be a valid channel name segment").optional(),
    channelTemplate: nonEmpty
      .refine((v) => v.includes("{robotName}"), "must contain {robotName}")
      .optional(),
    workspaceRoot: nonEmpty.optional(),

    // Commands
    subsystem: commandSpec.optional(),
    main: commandSpec.optional(),
    probe: z.object({ command: nonEmpty, args: z.array(z.string()) }).strict().optional(),
    stateField: nonEmpty.regex(/^[^\s:]+$/, "must not contain whitespace or ':'").optional(),
    targetState: nonEmpty.optional(),

    // Timing
    settleDelayMs: z.number().int().min(0).optional(),
    pollIntervalMs: positiveMs.optional(),
    readinessTimeoutMs: positiveMs.optional(),
    probeTimeoutMs: positiveMs.optional(),
    stalenessThresholdMs: positiveMs.optional(),
    restartPauseMs: z.number().int().min(0).optional(),
    killGracePeriodMs: positiveMs.optional(),
    monitorIntervalMs: positiveMs.optional(),
    shutdownTimeoutMs: positiveMs.optional(),

    // Recovery
    maxRestartAttempts: z.number().int().min(0).optional(),
    consecutiveFailureWarnThreshold: z.number().int().min(1).optional(),

    // Child environment
    unbufferedEnv: z.record(z.string()).optional(),
  })
  .strict();
