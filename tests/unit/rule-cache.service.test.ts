import { RuleCache } from '@/services/rule-cache.service';
import { Rule } from '@/types/rule.types';

const rule = (topic: string): Rule => ({
  rule: { variable: 'temperature', operator: '>', value: 30 },
  action: { topic, message: { fan: 'on' } },
});

describe('RuleCache', () => {
  test('should replace rules wholesale on refresh', async () => {
    const source = jest
      .fn<Promise<Rule[]>, []>()
      .mockResolvedValueOnce([rule('a'), rule('b')])
      .mockResolvedValueOnce([rule('c')]);
    const cache = new RuleCache(source);

    await cache.refresh();
    expect(cache.list().map((r) => r.action.topic)).toEqual(['a', 'b']);

    await cache.refresh();
    expect(cache.list().map((r) => r.action.topic)).toEqual(['c']);
    expect(cache.size).toBe(1);
  });

  test('should keep previous rules and rethrow when a refresh fails', async () => {
    const source = jest
      .fn<Promise<Rule[]>, []>()
      .mockResolvedValueOnce([rule('a')])
      .mockRejectedValueOnce(new Error('platform down'));
    const cache = new RuleCache(source);

    await cache.refresh();
    await expect(cache.refresh()).rejects.toThrow('platform down');
    expect(cache.list().map((r) => r.action.topic)).toEqual(['a']);
  });

  test('should hand out copies', async () => {
    const cache = new RuleCache(() => Promise.resolve([rule('a')]));
    await cache.refresh();

    cache.list()[0].action.message.fan = 'off';

    expect(cache.list()[0].action.message).toEqual({ fan: 'on' });
  });
});
