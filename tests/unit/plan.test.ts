import { describe, it, expect } from 'vitest';
import { LoadTestPlan, toLoadTestPlan, validateLoadTestPlan } from '../../src/plan.js';
import { testDescriptor } from '../helpers/fake-transport.js';

describe('toLoadTestPlan', () => {
  it('maps the run onto one thread group with one sampler', () => {
    const descriptor = testDescriptor({
      method: 'POST',
      url: 'https://api.example.test/v1/items/{id}',
      pathParameters: { id: '9' },
      queryParameters: { trace: '1' },
      headers: { 'X-Api-Key': 'test-key' },
      body: '{"a":1}',
    });

    expect(toLoadTestPlan({ descriptor, parameters: { threadCount: 8, iterations: 25 } })).toEqual({
      name: 'Load test: POST https://api.example.test/v1/items/{id}',
      threadGroups: [
        {
          name: 'Thread Group',
          threadCount: 8,
          rampUpSeconds: 1,
          loopCount: 25,
          samplers: [
            {
              name: 'POST https://api.example.test/v1/items/{id}',
              method: 'POST',
              url: 'https://api.example.test/v1/items/9?trace=1',
              headers: { 'X-Api-Key': 'test-key' },
              body: '{"a":1}',
              timeoutMs: 5000,
              followRedirects: true,
            },
          ],
        },
      ],
    });
  });

  it('uses a custom name and leaves out a missing body', () => {
    const plan = toLoadTestPlan({ descriptor: testDescriptor(), parameters: { threadCount: 1, iterations: 1 } }, 'Smoke');
    expect(plan.name).toBe('Smoke');
    expect(plan.threadGroups[0].samplers[0]).not.toHaveProperty('body');
    expect(validateLoadTestPlan(plan)).toEqual([]);
  });
});

describe('validateLoadTestPlan', () => {
  it('reports problems per thread group', () => {
    const plan: LoadTestPlan = {
      name: ' ',
      threadGroups: [
        { name: '', threadCount: 1001, rampUpSeconds: -1, loopCount: 0, samplers: [] },
        {
          name: 'ok',
          threadCount: 0,
          rampUpSeconds: 0,
          loopCount: 1,
          samplers: [{ name: 's', method: 'GET', url: '', headers: {}, timeoutMs: 1000, followRedirects: true }],
        },
      ],
    };

    expect(validateLoadTestPlan(plan)).toEqual([
      'Test plan name cannot be empty',
      'Thread group 0: Thread group name cannot be empty',
      'Thread group 0: Thread count cannot exceed 1000',
      'Thread group 0: Ramp-up period cannot be negative',
      'Thread group 0: Loop count must be at least 1',
      'Thread group 0: Thread group must contain at least one HTTP sampler',
      'Thread group 1: Thread count must be at least 1',
      'Thread group 1: HTTP sampler 0: URL cannot be empty',
    ]);
  });

  it('requires a thread group', () => {
    expect(validateLoadTestPlan({ name: 'empty', threadGroups: [] })).toEqual([
      'Test plan must contain at least one thread group',
    ]);
  });
});
