import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

class CurrentCounter {
  total: Counter<string>;
  current: Gauge<string>;

  constructor(registry: Registry, config: { name: string; help: string }) {
    this.total = new Counter({
      name: `drawboard_${config.name}_total`,
      help: `Total number of ${config.help}`,
      registers: [registry],
    });

    this.current = new Gauge({
      name: `drawboard_${config.name}_current`,
      help: `Current number of ${config.help}`,
      registers: [registry],
    });
  }

  inc() {
    this.total.inc();
    this.current.inc();
  }

  dec() {
    this.current.dec();
  }
}

/** Per-instance metric set; every instance owns its registry so tests can build as many as they like. */
export class BoardMetrics {
  readonly registry = new Registry();

  readonly connections = new CurrentCounter(this.registry, {
    name: 'ws_connections',
    help: 'push connections',
  });

  readonly envelopesReceived = new Counter({
    name: 'drawboard_envelopes_received_total',
    help: 'Envelopes decoded from clients',
    labelNames: ['type'] as const,
    registers: [this.registry],
  });

  readonly framesRejected = new Counter({
    name: 'drawboard_frames_rejected_total',
    help: 'Frames that did not decode to a known envelope',
    labelNames: ['reason'] as const,
    registers: [this.registry],
  });

  readonly broadcastSends = new Counter({
    name: 'drawboard_broadcast_sends_total',
    help: 'Per-connection sends issued by broadcasts',
    labelNames: ['outcome'] as const,
    registers: [this.registry],
  });

  readonly strokesPersisted = new Counter({
    name: 'drawboard_strokes_persisted_total',
    help: 'Stroke persistence attempts from the push channel',
    labelNames: ['outcome'] as const,
    registers: [this.registry],
  });

  readonly recognitions = new Counter({
    name: 'drawboard_recognitions_total',
    help: 'Classification requests served',
    registers: [this.registry],
  });

  constructor(options: { collectDefaults?: boolean } = {}) {
    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  render(): Promise<string> {
    return this.registry.metrics();
  }
}
