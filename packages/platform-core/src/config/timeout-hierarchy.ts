import { getLogger } from '../logging/logger';

const logger = getLogger('timeout-hierarchy');

export interface TimeoutTier {
  gateway: number;
  service: number;
  database: number;
}

function envMs(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

const DEFAULTS: TimeoutTier = {
  gateway: envMs('TIMEOUT_GATEWAY_MS', 60000),
  service: envMs('TIMEOUT_SERVICE_MS', 30000),
  database: envMs('TIMEOUT_DATABASE_MS', 15000),
};

const SERVICE_OVERRIDES: Record<string, Partial<TimeoutTier>> = {
  'life-stream-service': {
    gateway: envMs('TIMEOUT_LIFE_STREAM_GATEWAY_MS', 90000),
    service: envMs('TIMEOUT_LIFE_STREAM_SERVICE_MS', 60000),
    database: envMs('TIMEOUT_LIFE_STREAM_DATABASE_MS', 30000),
  },
  'knowledge-graph-service': {
    service: envMs('TIMEOUT_KNOWLEDGE_GRAPH_SERVICE_MS', 10000),
    database: envMs('TIMEOUT_KNOWLEDGE_GRAPH_DATABASE_MS', 5000),
  },
  'reasoning-service': {
    gateway: envMs('TIMEOUT_REASONING_GATEWAY_MS', 90000),
    service: envMs('TIMEOUT_REASONING_SERVICE_MS', 45000),
  },
};

function validateTier(tier: TimeoutTier, context: string): string[] {
  const violations: string[] = [];
  if (tier.gateway <= tier.service) {
    violations.push(`[${context}] gateway timeout (${tier.gateway}ms) must be > service timeout (${tier.service}ms)`);
  }
  if (tier.service <= tier.database) {
    violations.push(`[${context}] service timeout (${tier.service}ms) must be > database timeout (${tier.database}ms)`);
  }
  return violations;
}

/**
 * Gateway > service > database, per service. A lower tier timing out first
 * lets the caller above it still answer.
 */
export class TimeoutHierarchy {
  private readonly defaults: TimeoutTier = { ...DEFAULTS };
  private tiers = new Map<string, TimeoutTier>();

  constructor() {
    for (const [service, overrides] of Object.entries(SERVICE_OVERRIDES)) {
      this.tiers.set(service, { ...this.defaults, ...overrides });
    }
  }

  validate(): { valid: boolean; violations: string[] } {
    const violations = [
      ...validateTier(this.defaults, 'default'),
      ...Array.from(this.tiers.entries()).flatMap(([name, tier]) => validateTier(tier, name)),
    ];

    for (const v of violations) {
      logger.warn(`Timeout hierarchy violation: ${v}`);
    }
    if (violations.length > 0 && process.env.NODE_ENV === 'production') {
      throw new Error(`FATAL: ${violations.length} timeout hierarchy violation(s) detected`);
    }

    return { valid: violations.length === 0, violations };
  }

  getForService(serviceName?: string): TimeoutTier {
    return (serviceName && this.tiers.get(serviceName)) || this.defaults;
  }

  getServiceTimeout(serviceName?: string): number {
    return this.getForService(serviceName).service;
  }

  getDatabaseTimeout(serviceName?: string): number {
    return this.getForService(serviceName).database;
  }

  registerServiceTier(serviceName: string, tier: Partial<TimeoutTier>): void {
    const merged: TimeoutTier = { ...this.defaults, ...tier };
    for (const v of validateTier(merged, serviceName)) {
      logger.warn(`Timeout hierarchy violation on register: ${v}`);
    }
    this.tiers.set(serviceName, merged);
  }
}

export const timeoutHierarchy = new TimeoutHierarchy();
