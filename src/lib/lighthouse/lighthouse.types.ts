/**
 * Lighthouse Types
 * Only the parts of the JSON report the speed audit reads
 */

import { z } from 'zod';

const auditResultSchema = z.object({
  score: z.number().nullable().optional(),
  numericValue: z.number().optional(),
  displayValue: z.string().optional(),
});

export const lighthouseReportSchema = z.object({
  lighthouseVersion: z.string().optional(),
  categories: z.record(z.object({ score: z.number().nullable().optional() })).default({}),
  audits: z.record(auditResultSchema).default({}),
  environment: z
    .object({
      lighthouseVersion: z.string().optional(),
      networkUserAgent: z.string().optional(),
    })
    .default({}),
});

export type LighthouseAuditResult = z.infer<typeof auditResultSchema>;
export type LighthouseReport = z.infer<typeof lighthouseReportSchema>;

export interface LighthouseRunOptions {
  categories: string[];
  timeoutMs: number;
}

export enum LighthouseErrorKind {
  FAILED = 'failed',
  TIMEOUT = 'timeout',
  INVALID_OUTPUT = 'invalid_output',
}

export class LighthouseRunError extends Error {
  constructor(
    public readonly kind: LighthouseErrorKind,
    message: string
  ) {
    super(message);
    this.name = 'LighthouseRunError';
  }
}

export interface LighthouseRunner {
  /** Installed CLI version, or null when the CLI cannot be run */
  version(): Promise<string | null>;
  run(url: string, options: LighthouseRunOptions): Promise<LighthouseReport>;
}
