/**
 * Unit tests for load balancer strategy helpers.
 */

import { isLoadBalancerStrategy, LOAD_BALANCER_STRATEGIES } from '../../src/core/types';

describe('isLoadBalancerStrategy', () => {
  it('should accept every listed strategy', () => {
    for (const strategy of LOAD_BALANCER_STRATEGIES) {
      expect(isLoadBalancerStrategy(strategy)).toBe(true);
    }
  });

  it('should reject unknown, differently cased and inherited names', () => {
    expect(isLoadBalancerStrategy('maglev')).toBe(false);
    expect(isLoadBalancerStrategy('')).toBe(false);
    expect(isLoadBalancerStrategy('toString')).toBe(false);
  });
});
