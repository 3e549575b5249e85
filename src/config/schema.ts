/**
 * Shape of the YAML configuration documents.
 *
 * Components are a tagged union on `mode`; unknown keys are rejected so a
 * misspelled option fails the load instead of silently taking its default.
 */

import { z } from 'zod';

const symbol = z.string().trim().min(1);
const percentage = z.number().finite().min(0).max(100);

export const ComponentSchema = z.discriminatedUnion('mode', [
    z.object({
        mode: z.literal('fixed'),
        symbol,
        name: z.string().min(1),
        weight: percentage.optional(),
    }).strict(),
    z.object({
        mode: z.literal('market_cap'),
        symbol,
        name: z.string().min(1),
        capExempt: z.boolean().default(false),
    }).strict(),
    z.object({
        mode: z.literal('conditional_overflow'),
        symbol,
        name: z.string().min(1),
        trigger: symbol,
    }).strict(),
]);

export const TierSchema = z.object({
    tier: z.number().int().positive(),
    overflow: z.enum(['redistribute', 'cascade']).default('redistribute'),
    components: z.array(ComponentSchema).min(1),
}).strict();

export const CategorySchema = z.object({
    tiers: z.array(TierSchema).min(1),
}).strict();

export const SubPortfolioSchema = z.object({
    name: z.string().trim().min(1),
    equityAllocation: percentage,
    fixedIncomeAllocation: percentage,
    anchorWeight: z.number().positive().max(100).optional(),
}).strict();

export const FundSchema = z.object({
    name: z.string().min(1),
    anchorWeight: z.number().positive().max(100),
    subPortfolios: z.array(SubPortfolioSchema).min(1),
    categories: z.object({
        fixed_income: CategorySchema.optional(),
        equity: CategorySchema.optional(),
    }).strict(),
}).strict();

export const FundsDocumentSchema = z.object({
    activeFunds: z.array(z.string().min(1)).min(1),
    funds: z.record(FundSchema),
}).strict();

const ReconciliationOverrideSchema = z.object({
    enabled: z.boolean().optional(),
    changeThreshold: z.number().positive().optional(),
}).strict();

const ValidationOverrideSchema = z.object({
    concentrationCap: z.number().positive().max(100).optional(),
    sumTolerance: z.number().nonnegative().optional(),
    nearCapBand: z.number().nonnegative().optional(),
    reconciliation: ReconciliationOverrideSchema.optional(),
}).strict();

export const ValidationDocumentSchema = z.object({
    global: ValidationOverrideSchema.default({}),
    fundOverrides: z.record(ValidationOverrideSchema).default({}),
}).strict();

export type ComponentDocument = z.infer<typeof ComponentSchema>;
export type CategoryDocument = z.infer<typeof CategorySchema>;
export type FundDocument = z.infer<typeof FundSchema>;
export type FundsDocument = z.infer<typeof FundsDocumentSchema>;
export type ValidationDocument = z.infer<typeof ValidationDocumentSchema>;
