/**
 * Rule ids, levels and default rule configuration.
 *
 * twinscan ships one rule. The id is shared with the sibling rule plugins'
 * violation contract, so it must stay stable.
 */

/**
 * All rule IDs this engine can emit.
 * DO NOT rename existing IDs - only extend.
 */
export type RuleId = "DUPLICATE_CODE";

/**
 * Rule severity levels.
 * - error: Blocks the quality gate
 * - warning: Should be fixed, but not blocking
 * - info: Advisory
 * - off: Rule is disabled
 */
export type RuleLevel = "error" | "warning" | "info" | "off";

export const RULE_LEVELS: readonly RuleLevel[] = ["error", "warning", "info", "off"];

/**
 * Configuration for a single rule.
 */
export interface RuleConfig {
  enabled?: boolean;
  level?: RuleLevel;
}

/**
 * Complete (required) rule configuration.
 */
export interface RequiredRuleConfig {
  enabled: boolean;
  level: RuleLevel;
}

export const DEFAULT_RULE_CONFIG: Record<RuleId, RequiredRuleConfig> = {
  DUPLICATE_CODE: { enabled: true, level: "warning" },
};

/**
 * Check if a string is a valid RuleId.
 */
export function isValidRuleId(id: string): id is RuleId {
  return Object.prototype.hasOwnProperty.call(DEFAULT_RULE_CONFIG, id);
}

export function isRuleLevel(value: unknown): value is RuleLevel {
  return RULE_LEVELS.some((level) => level === value);
}
