import { Bench } from 'tinybench';

import { ExperimentConfig, ObjectBuilder, Registry, recordNamespace } from '../src/index.js';
import type { ConfigDocument } from '../src/index.js';

/**
 * Build Throughput Benchmark
 *
 * Measures the cost of turning configuration documents into objects:
 * plain passthrough, plugin calls, sibling references and a full eager build
 * of a wide experiment.
 */

const registry = new Registry('Bench');

registry.register(
  class Linear {
    constructor(readonly kwargs: { inFeatures: number; outFeatures: number }) {}
  }
);
registry.register(
  class Sequential {
    constructor(readonly kwargs: { layers: unknown[] }) {}
  }
);
registry.register(function adam({ lr = 0.001, model }: { lr?: number; model: unknown }) {
  return { lr, model };
});

const plain: ConfigDocument = {
  run: { name: 'bench', epochs: 10, seeds: [1, 2, 3, 4], tags: { team: 'core', tier: 2 } },
};

const layers = Array.from({ length: 16 }, (_, i) => ({
  _name: 'Linear',
  inFeatures: 2 ** (i % 8),
  outFeatures: '$WIDTH',
}));

const model: ConfigDocument = {
  model: { _name: 'Sequential', layers },
  optimizer: { _name: 'adam', lr: 0.01, model: '$model' },
};

const wide: ConfigDocument = Object.fromEntries(
  Array.from({ length: 200 }, (_, i) => [`k${i}`, i === 0 ? { _name: 'Linear', inFeatures: 1, outFeatures: 1 } : `$k${i - 1}`])
);

async function runBuildBenchmark() {
  console.log('=== Build Throughput Benchmark ===\n');

  const passthrough = new ObjectBuilder([]);
  const standard = ObjectBuilder.standard({
    registry,
    namespaces: [recordNamespace('Environment', { WIDTH: 64 })],
  });

  const bench = new Bench({ time: 1000 });

  bench
    // B1: Empty chain, every node passes through
    .add('B1: Passthrough (empty chain)', () => {
      passthrough.instantiate(plain, 'plain');
    })

    // B2: Full chain over a document with no plugins or references
    .add('B2: Plain document (standard chain)', () => {
      standard.instantiate(plain, 'plain');
    })

    // B3: Plugin calls with environment references
    .add('B3: Model + optimizer (lazy, cold)', () => {
      new ExperimentConfig(model, { registry, env: { WIDTH: 64 }, eager: false }).getOrBuild('optimizer');
    })

    // B4: Reference chain 200 keys deep, built at construction
    .add('B4: Wide reference chain (eager)', () => {
      new ExperimentConfig(wide, { registry });
    });

  console.log(`[phase] running ${bench.tasks.length} tasks...`);
  await bench.run();
  console.table(bench.table());
}

runBuildBenchmark().catch(console.error);
