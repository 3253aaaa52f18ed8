import { Rule } from '@/types/rule.types';
import { SerialQueue } from '@/utils/serial-queue.utils';
import { getErrorMessage } from '@/utils/errors.utils';
import { logger } from '@/utils/logger';

export type RuleSource = () => Promise<Rule[]>;

const cloneRule = (rule: Rule): Rule => ({
  rule: rule.rule,
  action: { topic: rule.action.topic, message: { ...rule.action.message } },
});

/**
 * Device-local copy of the platform's rules. A refresh replaces the whole
 * list; a failed refresh leaves the previous list in place.
 */
export class RuleCache {
  private rules: Rule[] = [];
  private readonly queue = new SerialQueue();

  constructor(private readonly source: RuleSource) {}

  refresh(): Promise<Rule[]> {
    return this.queue.run(async () => {
      let fetched: Rule[];
      try {
        fetched = await this.source();
      } catch (error) {
        logger.error(`Failed to refresh rules: ${getErrorMessage(error)}`);
        throw error;
      }
      this.rules = fetched.map(cloneRule);
      logger.info(`Rule cache refreshed with ${this.rules.length} rules`);
      return this.list();
    });
  }

  list(): Rule[] {
    return this.rules.map(cloneRule);
  }

  get size(): number {
    return this.rules.length;
  }
}
