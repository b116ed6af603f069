import { register, collectDefaultMetrics, Counter, Histogram } from 'prom-client';

collectDefaultMetrics();

export const computationCounter = new Counter({
  name: 'hmpi_computations_total',
  help: 'Number of index computations run',
  labelNames: ['weight_scheme'],
});

export const rowsProcessedCounter = new Counter({
  name: 'hmpi_rows_processed_total',
  help: 'Number of sample rows processed',
});

export const undefinedResultCounter = new Counter({
  name: 'hmpi_undefined_results_total',
  help: 'Rows whose index came out undefined for lack of valid inputs',
  labelNames: ['index'],
});

export const computeDuration = new Histogram({
  name: 'hmpi_compute_duration_seconds',
  help: 'Duration of index computations in seconds',
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2],
});

export { register };
