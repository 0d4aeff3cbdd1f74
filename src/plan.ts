import { buildUrl } from './request.js';
import { ExecutionParameters, HttpMethod, RequestDescriptor } from './types.js';

export interface LoadTestSampler {
  name: string;
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number;
  followRedirects: boolean;
}

export interface LoadTestThreadGroup {
  name: string;
  threadCount: number;
  rampUpSeconds: number;
  loopCount: number;
  samplers: LoadTestSampler[];
}

export interface LoadTestPlan {
  name: string;
  threadGroups: LoadTestThreadGroup[];
}

/** An AggregateResult, or the descriptor and parameters a run would use. */
export interface PlanSource {
  descriptor: RequestDescriptor;
  parameters: ExecutionParameters;
}

/**
 * Describes the run as a test plan an external load-testing tool can be generated from.
 */
export function toLoadTestPlan(source: PlanSource, name?: string): LoadTestPlan {
  const { descriptor, parameters } = source;
  const displayName = `${descriptor.method} ${descriptor.url}`;

  return {
    name: name ?? `Load test: ${displayName}`,
    threadGroups: [
      {
        name: 'Thread Group',
        threadCount: parameters.threadCount,
        rampUpSeconds: 1,
        loopCount: parameters.iterations,
        samplers: [
          {
            name: displayName,
            method: descriptor.method,
            url: buildUrl(descriptor),
            headers: { ...descriptor.headers },
            ...(descriptor.body !== undefined && { body: descriptor.body }),
            timeoutMs: descriptor.timeoutMs,
            followRedirects: descriptor.followRedirects,
          },
        ],
      },
    ],
  };
}

export function validateLoadTestPlan(plan: LoadTestPlan): string[] {
  const errors: string[] = [];

  if (plan.name.trim() === '') {
    errors.push('Test plan name cannot be empty');
  }
  if (plan.threadGroups.length === 0) {
    errors.push('Test plan must contain at least one thread group');
  }

  plan.threadGroups.forEach((group, index) => {
    const prefix = `Thread group ${index}`;
    if (group.name.trim() === '') errors.push(`${prefix}: Thread group name cannot be empty`);
    if (group.threadCount < 1) errors.push(`${prefix}: Thread count must be at least 1`);
    if (group.threadCount > 1000) errors.push(`${prefix}: Thread count cannot exceed 1000`);
    if (group.rampUpSeconds < 0) errors.push(`${prefix}: Ramp-up period cannot be negative`);
    if (group.loopCount < 1) errors.push(`${prefix}: Loop count must be at least 1`);
    if (group.samplers.length === 0) errors.push(`${prefix}: Thread group must contain at least one HTTP sampler`);

    group.samplers.forEach((sampler, samplerIndex) => {
      if (sampler.url.trim() === '') {
        errors.push(`${prefix}: HTTP sampler ${samplerIndex}: URL cannot be empty`);
      }
    });
  });

  return errors;
}
