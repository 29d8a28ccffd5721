const metrics = {
  allowed: 0,
  blocked: 0,
  usageErrors: 0,
  identityAnswers: 0,
  generationErrors: 0,
};

export type Metrics = typeof metrics;

export function recordAllowed() {
  metrics.allowed++;
}

export function recordBlocked() {
  metrics.blocked++;
}

export function recordUsageError() {
  metrics.usageErrors++;
}

export function recordIdentityAnswer() {
  metrics.identityAnswers++;
}

export function recordGenerationError() {
  metrics.generationErrors++;
}

export function getMetrics(): Metrics {
  return { ...metrics };
}

export function resetMetrics() {
  metrics.allowed = 0;
  metrics.blocked = 0;
  metrics.usageErrors = 0;
  metrics.identityAnswers = 0;
  metrics.generationErrors = 0;
}
