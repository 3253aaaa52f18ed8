export interface RuleAction {
  topic: string;
  message: Record<string, unknown>;
}

export interface Rule {
  rule: unknown;              // Condition, interpreted by the RuleMatcher
  action: RuleAction;
}

export interface RuleMatcher {
  matches(condition: unknown, data: Record<string, unknown>): boolean;
}
