#!/usr/bin/env tsx

import { performance } from 'node:perf_hooks';
import { HugeNumber } from '../src/lib/num/HugeNumber.js';
import { createLogger } from '../src/log.js';

const log = createLogger();

interface BenchResult {
    operation: string;
    iterations: number;
    durationMs: number;
    p50: number;
    p95: number;
    p99: number;
    opsPerSec: number;
}

interface BenchCase {
    operation: string;
    iterations: number;
    fn: () => HugeNumber;
}

function measure({ operation, iterations, fn }: BenchCase): BenchResult {
    const latencies: number[] = [];
    const start = performance.now();

    for (let i = 0; i < iterations; i++) {
        const startOp = performance.now();
        fn();
        latencies.push(performance.now() - startOp);
    }
    const duration = performance.now() - start;

    latencies.sort((a, b) => a - b);
    const p50 = latencies[Math.floor(latencies.length * 0.5)];
    const p95 = latencies[Math.floor(latencies.length * 0.95)];
    const p99 = latencies[Math.floor(latencies.length * 0.99)];

    return {
        operation,
        iterations,
        durationMs: duration,
        p50,
        p95,
        p99,
        opsPerSec: (iterations / duration) * 1000,
    };
}

function printResult(result: BenchResult): void {
    const us = (ms: number) => `${(ms * 1000).toFixed(2)}us`;
    console.log(`\n${result.operation}:`);
    console.log(`  Iterations: ${result.iterations}`);
    console.log(`  Duration: ${result.durationMs.toFixed(2)}ms`);
    console.log(`  P50: ${us(result.p50)}  P95: ${us(result.p95)}  P99: ${us(result.p99)}`);
    console.log(`  Ops/sec: ${result.opsPerSec.toFixed(0)}`);
}

function main(): void {
    const small = HugeNumber.fromComponents(123456789n, -4);
    const wide = HugeNumber.fromComponents(987654321987654321n, 40);
    const third = HugeNumber.fromFraction(1, 3);
    const seventh = HugeNumber.fromFraction(22, 7);

    const cases: BenchCase[] = [
        { operation: 'mul (exact)', iterations: 100_000, fn: () => small.mul(small) },
        { operation: 'mul (wide)', iterations: 100_000, fn: () => wide.mul(wide) },
        { operation: 'add (aligned)', iterations: 100_000, fn: () => small.add(wide) },
        { operation: 'add (rational)', iterations: 100_000, fn: () => third.add(seventh) },
        { operation: 'div (long division)', iterations: 50_000, fn: () => wide.div(small) },
        { operation: 'log', iterations: 2_000, fn: () => wide.log() },
        { operation: 'exp', iterations: 2_000, fn: () => small.exp() },
        { operation: 'pow (fractional)', iterations: 1_000, fn: () => small.pow(seventh) },
        { operation: 'sqrt', iterations: 20_000, fn: () => wide.sqrt() },
    ];

    for (const c of cases) printResult(measure(c));
    console.log('\nBenchmark complete!');
}

if (require.main === module) {
    try {
        main();
    } catch (err) {
        log.error({ msg: 'bench_error', error: String(err) });
        process.exit(1);
    }
}
