import { z } from 'zod';

import { REGION } from '../config/constants';

/**
 * Numeric form field. Host form data arrives as strings, so numeric strings
 * are accepted; empty, non-numeric and infinite values are rejected.
 */
const numericFieldSchema = z
  .union([z.number(), z.string().trim().min(1).transform(Number)])
  .pipe(z.number());

/** Explicit page-space clip: `coordsOrigin=pdf` plus x/y/width/height in points */
export const clipRequestSchema = z.object({
  coordsOrigin: z.literal(REGION.PAGE_SPACE_ORIGIN),
  x: numericFieldSchema,
  y: numericFieldSchema,
  width: numericFieldSchema,
  height: numericFieldSchema,
});

/** Zero-based page index */
export const pageIndexSchema = numericFieldSchema.pipe(
  z.number().int().nonnegative(),
);

export type ParsedClipRequest = z.infer<typeof clipRequestSchema>;

/** Raw form value as the host receives it */
export type FormValue = string | number | undefined;

/**
 * Region fields of a detection request
 */
export interface ClipRequest {
  coordsOrigin?: string;
  x?: FormValue;
  y?: FormValue;
  width?: FormValue;
  height?: FormValue;
}

/**
 * Detection request as forwarded by the host
 */
export interface DetectionRequest extends ClipRequest {
  /** Zero-based page index (default: 0) */
  pageIndex?: FormValue;
}
