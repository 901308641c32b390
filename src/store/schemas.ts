/**
 * Store Boundary Validation
 *
 * zod schemas every entity passes through on its way into (and, for the
 * file backend, back out of) the store.
 */

import { z } from 'zod';
import { parseShopDomain } from '../shop.js';
import { InvalidInputError } from '../errors.js';

// =============================================================================
// FIELDS
// =============================================================================

export const shopDomainSchema = z.string().transform((value, ctx) => {
  const shop = parseShopDomain(value);
  if (!shop) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a shop domain' });
    return z.NEVER;
  }
  return shop;
});

export const contactNumberSchema = z
  .string()
  .trim()
  .refine((value) => /^\d{6,20}$/.test(value.replace(/[+\-\s]/g, '')), {
    message: 'must be a phone number',
  });

export const initialMessageSchema = z.string().trim().min(1).max(500);

// =============================================================================
// INPUTS
// =============================================================================

export const installationInputSchema = z.object({
  shop: shopDomainSchema,
  accessToken: z.string().min(1),
  scope: z.string().default(''),
});

export const widgetConfigInputSchema = z.object({
  contactNumber: contactNumberSchema,
  initialMessage: initialMessageSchema,
});

export const oauthStateSchema = z.object({
  nonce: z.string().min(16),
  shop: shopDomainSchema,
  issuedAt: z.date(),
  expiresAt: z.date(),
});

// =============================================================================
// FILE DOCUMENT
// =============================================================================

const storedInstallationSchema = z.object({
  shop: shopDomainSchema,
  accessToken: z.string(),
  scope: z.string().default(''),
  installedAt: z.coerce.date(),
});

const storedWidgetConfigSchema = z.object({
  shop: shopDomainSchema,
  contactNumber: z.string(),
  initialMessage: z.string(),
  updatedAt: z.coerce.date(),
});

const storedAnalyticsSchema = z.object({
  shop: shopDomainSchema,
  clickCount: z.number().int().nonnegative(),
  firstClickAt: z.coerce.date().nullable(),
  lastClickAt: z.coerce.date().nullable(),
});

/**
 * On-disk layout: three maps keyed by shop domain
 */
export const storeDocumentSchema = z.object({
  installations: z.record(storedInstallationSchema).default({}),
  configs: z.record(storedWidgetConfigSchema).default({}),
  analytics: z.record(storedAnalyticsSchema).default({}),
});

export type StoreDocument = z.infer<typeof storeDocumentSchema>;

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Parse a value or throw InvalidInputError listing every issue
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new InvalidInputError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`)
    );
  }
  return result.data;
}
