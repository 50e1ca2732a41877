// src/monitoring/metrics.ts
import client from 'prom-client';

// Create metrics registry
const register = new client.Registry();

// Add default Node.js metrics (CPU, memory, etc.)
client.collectDefaultMetrics({ register });

export const kvMetrics = {
  // Every line the console decodes, labelled by verb (INVALID for rejected lines)
  commandsTotal: new client.Counter({
    name: 'kv_commands_total',
    help: 'Commands processed by the console',
    labelNames: ['command'] as const
  }),

  commandDuration: new client.Histogram({
    name: 'kv_command_duration_seconds',
    help: 'How long commands take',
    labelNames: ['command'] as const,
    buckets: [0.00001, 0.0001, 0.001, 0.01, 0.1] // seconds
  }),

  transactionsBegun: new client.Counter({
    name: 'kv_transactions_begun_total',
    help: 'Transaction blocks opened'
  }),

  // One increment per COMMIT, however many blocks it closes
  transactionsCommitted: new client.Counter({
    name: 'kv_transactions_committed_total',
    help: 'Committed transaction stacks'
  }),

  transactionsRolledBack: new client.Counter({
    name: 'kv_transactions_rolled_back_total',
    help: 'Rolled back transaction blocks'
  }),

  transactionDepth: new client.Gauge({
    name: 'kv_transaction_depth',
    help: 'Currently open transaction blocks'
  }),

  keys: new client.Gauge({
    name: 'kv_keys',
    help: 'Keys in the committed store'
  })
};

register.registerMetric(kvMetrics.commandsTotal);
register.registerMetric(kvMetrics.commandDuration);
register.registerMetric(kvMetrics.transactionsBegun);
register.registerMetric(kvMetrics.transactionsCommitted);
register.registerMetric(kvMetrics.transactionsRolledBack);
register.registerMetric(kvMetrics.transactionDepth);
register.registerMetric(kvMetrics.keys);

export { register };
