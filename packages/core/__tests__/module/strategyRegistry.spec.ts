import '../../src/config/defaults.js';
import { StrategyRegistry } from '../../src/config/StrategyRegistry.js';
import { StrategyError }    from '../../src/errors/index.js';

describe('StrategyRegistry', () => {
  it('registers the built-in strategies', () => {
    expect(StrategyRegistry.names).toEqual(['single', 'accumulate']);
    expect(StrategyRegistry.get('accumulate').name).toBe('accumulate');
  });

  it('throws on unknown strategy', () => {
    expect(() => StrategyRegistry.get('optimistic')).toThrow(StrategyError);
  });

  it('prevents duplicate registration', () => {
    const dup = StrategyRegistry.get('single');
    expect(() => StrategyRegistry.register(dup)).toThrow(StrategyError);
  });
});
