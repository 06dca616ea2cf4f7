/**
 * Stress test + priority optimization. Probes every enabled provider a fixed
 * number of times without touching health state, then re-ranks the ones that
 * passed.
 */

import { performance } from "node:perf_hooks";
import type { GatewayEngine } from "./engine.js";
import type { ErrorKind } from "./types.js";

export const PASS_THRESHOLD_PERCENT = 75;
const STRESS_PROMPT = "Hello! Please respond with exactly: 'Test successful - gateway working!'";

export interface StressError {
  iteration: number;
  errorKind: ErrorKind;
  errorMessage: string;
}

export interface StressResult {
  provider: string;
  totalTests: number;
  successfulTests: number;
  failedTests: number;
  /** Seconds, successful attempts only. */
  responseTimes: number[];
  errors: StressError[];
  successRate: number;
  avgResponseTime: number;
  minResponseTime: number;
  maxResponseTime: number;
  passed: boolean;
}

export interface PriorityChange {
  provider: string;
  priority: number;
  score: number;
  avgResponseTime: number;
}

export type StressProgress = (result: StressResult) => void;

function summarize(provider: string, iterations: number, times: number[], errors: StressError[]): StressResult {
  const successfulTests = times.length;
  const successRate = iterations > 0 ? (successfulTests / iterations) * 100 : 0;
  const avg = times.length > 0 ? times.reduce((sum, t) => sum + t, 0) / times.length : 0;
  return {
    provider,
    totalTests: iterations,
    successfulTests,
    failedTests: iterations - successfulTests,
    responseTimes: times,
    errors,
    successRate,
    avgResponseTime: avg,
    minResponseTime: times.length > 0 ? Math.min(...times) : 0,
    maxResponseTime: times.length > 0 ? Math.max(...times) : 0,
    passed: successRate >= PASS_THRESHOLD_PERCENT,
  };
}

export async function runStressTest(
  engine: GatewayEngine,
  iterations = 3,
  onResult?: StressProgress,
): Promise<StressResult[]> {
  const results: StressResult[] = [];

  const enabled = engine.registry.all().filter((provider) => provider.enabled);

  for (const provider of enabled) {
    const times: number[] = [];
    const errors: StressError[] = [];

    for (let i = 1; i <= iterations; i++) {
      const started = performance.now();
      const outcome = await engine.probe(provider.name, [{ role: "user", content: STRESS_PROMPT }]);
      const seconds = (performance.now() - started) / 1000;
      if (outcome.success) {
        times.push(seconds);
      } else {
        errors.push({ iteration: i, errorKind: outcome.errorKind, errorMessage: outcome.errorMessage });
      }
    }

    const result = summarize(provider.name, iterations, times, errors);
    results.push(result);
    onResult?.(result);
  }

  return results;
}

/** Success rate weighs 60%, speed 40%; every second of latency costs 20 speed points. */
export function performanceScore(result: Pick<StressResult, "successRate" | "avgResponseTime">): number {
  const speedScore = Math.max(0, 100 - result.avgResponseTime * 20);
  return result.successRate * 0.6 + speedScore * 0.4;
}

/** Passing providers ranked by score, best first, as priorities 1..n. */
export function rankResults(results: ReadonlyArray<StressResult>): PriorityChange[] {
  return results
    .filter((result) => result.passed)
    .map((result) => ({ result, score: performanceScore(result) }))
    .sort((a, b) => b.score - a.score)
    .map(({ result, score }, i) => ({
      provider: result.provider,
      priority: i + 1,
      score,
      avgResponseTime: result.avgResponseTime,
    }));
}

/** Applies `rankResults` to the registry. Failing providers keep their priority. */
export function optimizePriorities(engine: GatewayEngine, results: ReadonlyArray<StressResult>): PriorityChange[] {
  const changes = rankResults(results);
  for (const change of changes) engine.registry.setPriority(change.provider, change.priority);
  return changes;
}
