import { z } from 'zod';
import { SizingMode, StrategyParameters } from '../types';
import { ConfigurationError } from '../utils/errors';

/**
 * Strategy parameters as they arrive from the API or the strategy_configs table.
 * Exactly one of positionSize / positionRatio must be present.
 */
export const strategyInputSchema = z.object({
  longThreshold: z.number().positive().max(1),
  shortThreshold: z.number().positive().max(1),
  defaultStopLossRatio: z.number().positive().max(1),
  positionSize: z.number().positive().optional(),
  positionRatio: z.number().positive().max(1).optional(),
  leverage: z.number().int().min(1).max(125).default(1),
  monitorIntervalMs: z.number().int().min(100).default(1000),
});

export type StrategyInput = z.input<typeof strategyInputSchema>;

export function parseStrategyParameters(input: unknown): StrategyParameters {
  const parsed = strategyInputSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'value'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid strategy parameters: ${details}`);
  }

  const { positionSize, positionRatio, ...rest } = parsed.data;
  return { ...rest, sizing: toSizingMode(positionSize, positionRatio) };
}

function toSizingMode(positionSize?: number, positionRatio?: number): SizingMode {
  if (positionSize !== undefined && positionRatio !== undefined) {
    throw new ConfigurationError('positionSize and positionRatio are mutually exclusive');
  }
  if (positionSize !== undefined) {
    return { mode: 'fixed', positionSize };
  }
  if (positionRatio !== undefined) {
    return { mode: 'ratio', positionRatio };
  }
  throw new ConfigurationError('One of positionSize or positionRatio is required');
}

/**
 * Inverse of parseStrategyParameters, used when persisting and serving configs.
 */
export function toStrategyInput(params: StrategyParameters): StrategyInput {
  const { sizing, ...rest } = params;
  return sizing.mode === 'fixed'
    ? { ...rest, positionSize: sizing.positionSize }
    : { ...rest, positionRatio: sizing.positionRatio };
}
