import type { Category, CategoryRuleInput, ContractorInput, RunConfig } from '../interfaces';
import { UNASSIGNED } from '../interfaces';
import { InvalidConfigurationError } from '../estimate.errors';

/**
 * Freezes the form input into the maps the pipeline reads. Duplicate
 * contractor names and repeated categories overwrite earlier entries.
 */
export function buildRunConfig(
  contractors: readonly ContractorInput[],
  rules: readonly CategoryRuleInput[],
): RunConfig {
  const payouts = new Map<string, number>();
  for (const { name, payoutFraction } of contractors) {
    if (!Number.isFinite(payoutFraction) || payoutFraction < 0 || payoutFraction > 1) {
      throw new InvalidConfigurationError(
        `Payout fraction for ${name} must be between 0 and 1, got ${payoutFraction}`,
      );
    }
    payouts.set(name, payoutFraction);
  }

  const assignments = new Map<Category, string>();
  for (const { category, assignee } of rules) {
    if (assignee !== UNASSIGNED && !payouts.has(assignee)) {
      throw new InvalidConfigurationError(
        `Rule for ${category} names unknown contractor ${assignee}`,
      );
    }
    assignments.set(category, assignee);
  }

  return { payouts, assignments };
}
