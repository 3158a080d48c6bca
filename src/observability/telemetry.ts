type CallMetric = {
  calls: number;
  failures: number;
  totalLatencyMs: number;
  maxLatencyMs: number;
};

const createCallMetric = (): CallMetric => ({
  calls: 0,
  failures: 0,
  totalLatencyMs: 0,
  maxLatencyMs: 0
});

const applyCall = (metric: CallMetric, durationMs: number, success: boolean) => {
  metric.calls += 1;
  if (!success) {
    metric.failures += 1;
  }
  metric.totalLatencyMs += durationMs;
  metric.maxLatencyMs = Math.max(metric.maxLatencyMs, durationMs);
};

const summarizeCalls = (metric: CallMetric) => ({
  calls: metric.calls,
  failures: metric.failures,
  failureRate: metric.calls > 0 ? metric.failures / metric.calls : 0,
  avgLatencyMs: metric.calls > 0 ? metric.totalLatencyMs / metric.calls : 0,
  maxLatencyMs: metric.maxLatencyMs
});

export class RuntimeTelemetry {
  private completions = createCallMetric();
  private summaries = createCallMetric();
  private relay = {
    turns: 0,
    commands: 0,
    unauthorized: 0,
    chunksSent: 0,
    deliveryFailures: 0
  };

  recordCompletion(durationMs: number, success: boolean) {
    applyCall(this.completions, durationMs, success);
  }

  recordSummary(durationMs: number, success: boolean) {
    applyCall(this.summaries, durationMs, success);
  }

  recordTurn() {
    this.relay.turns += 1;
  }

  recordCommand() {
    this.relay.commands += 1;
  }

  recordUnauthorized() {
    this.relay.unauthorized += 1;
  }

  recordDelivery(chunks: number, success: boolean) {
    this.relay.chunksSent += chunks;
    if (!success) {
      this.relay.deliveryFailures += 1;
    }
  }

  snapshot() {
    return {
      completions: summarizeCalls(this.completions),
      summaries: summarizeCalls(this.summaries),
      relay: { ...this.relay }
    };
  }
}
