/**
 * Zod schemas for the JSON files the engine loads at start-up:
 * bypass method descriptors, device profiles and authorizations.
 */

import { z } from 'zod';
import { DEVICE_MODES, MANUFACTURERS } from '../../types/device';

const deviceModeSchema = z.enum(DEVICE_MODES);

const manufacturerSchema = z.enum(MANUFACTURERS);

const stepIdSchema = z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'kebab-case step id required');

export const commandStepSchema = z.object({
  id: stepIdSchema,
  command: z.string().min(1, 'Step command required'),
  timeoutMs: z.number().int().positive().optional(),
  expect: z
    .string()
    .refine(pattern => {
      try {
        new RegExp(pattern);
        return true;
      } catch {
        return false;
      }
    }, 'expect must be a valid regular expression')
    .optional()
});

export const switchModeStepSchema = z.object({
  id: stepIdSchema,
  switchMode: deviceModeSchema
});

export const methodStepSchema = z.union([switchModeStepSchema, commandStepSchema]);

export const methodDescriptorSchema = z
  .object({
    name: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'kebab-case method name required'),
    kind: z.enum(['debug-bridge', 'boot-loader', 'manufacturer-download', 'emergency-download', 'chained']),
    requiredMode: deviceModeSchema,
    riskTier: z.number().int().min(0),
    baseWeight: z.number().min(0).max(1).default(1),
    manufacturers: z.array(manufacturerSchema).optional(),
    minApiLevel: z.number().int().positive().optional(),
    maxApiLevel: z.number().int().positive().optional(),
    description: z.string().optional(),
    steps: z.array(methodStepSchema).min(1, 'At least one step required')
  })
  .refine(
    method => new Set(method.steps.map(step => step.id)).size === method.steps.length,
    'Step ids must be unique within a method'
  );

export const methodCatalogSchema = z.object({
  version: z.number().int().min(1),
  methods: z.array(methodDescriptorSchema)
});

/** USB id as a number or a `0x1234` string */
const usbIdSchema = z.union([
  z.number().int().min(0).max(0xffff),
  z
    .string()
    .regex(/^0x[0-9a-fA-F]{4}$/, 'USB ids are written as 0x followed by four hex digits')
    .transform(value => parseInt(value, 16))
]);

export const deviceProfileSchema = z.object({
  manufacturer: manufacturerSchema,
  modelName: z.string().min(1),
  vendorId: usbIdSchema,
  productIds: z.array(usbIdSchema).default([]),
  modelAliases: z.array(z.string()).default([]),
  difficulty: z.enum(['easy', 'medium', 'hard', 'expert']),
  apiRange: z
    .object({
      min: z.number().int().positive().optional(),
      max: z.number().int().positive().optional()
    })
    .default({}),
  methods: z.record(z.string(), z.number().min(0).max(100))
});

export const profileCatalogSchema = z.object({
  version: z.number().int().min(1),
  profiles: z.array(deviceProfileSchema)
});

export const authorizationSchema = z.object({
  serial: z.string().min(1),
  reference: z.string().min(1, 'Authorization reference required'),
  expiresAt: z.string().datetime({ offset: true }).optional()
});

export const authorizationFileSchema = z.object({
  authorizations: z.array(authorizationSchema)
});

export type MethodCatalogFile = z.infer<typeof methodCatalogSchema>;
export type ProfileCatalogFile = z.infer<typeof profileCatalogSchema>;
export type ProfileEntry = z.infer<typeof deviceProfileSchema>;
export type AuthorizationEntry = z.infer<typeof authorizationSchema>;

/**
 * Flatten zod issues into one line per problem, prefixed with the JSON path
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}
