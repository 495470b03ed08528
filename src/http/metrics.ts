import { Counter, Gauge, Histogram, Registry } from "prom-client";
import type { Engine } from "./engine.js";

export type SearchOutcome = "hit" | "miss" | "invalid" | "error";

export class SearchMetrics {
  public readonly registry: Registry;

  private readonly searches: Counter<"outcome">;
  private readonly duration: Histogram;

  constructor(engine: Engine) {
    this.registry = new Registry();

    this.searches = new Counter({
      name: "address_search_requests_total",
      help: "Search requests by outcome",
      labelNames: ["outcome"],
      registers: [this.registry],
    });

    this.duration = new Histogram({
      name: "address_search_duration_seconds",
      help: "Time spent matching a query against the index",
      buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1, 0.5],
      registers: [this.registry],
    });

    new Gauge({
      name: "address_search_index_records",
      help: "Records in the published index snapshot",
      registers: [this.registry],
      collect() {
        this.set(engine.summary()?.records ?? 0);
      },
    });

    new Gauge({
      name: "address_search_index_tokens",
      help: "Distinct n-grams in the published index snapshot",
      registers: [this.registry],
      collect() {
        this.set(engine.summary()?.tokens ?? 0);
      },
    });

    new Gauge({
      name: "address_search_index_generation",
      help: "Generation number of the published index snapshot",
      registers: [this.registry],
      collect() {
        this.set(engine.summary()?.generation ?? 0);
      },
    });
  }

  recordSearch(outcome: SearchOutcome, seconds?: number): void {
    this.searches.inc({ outcome });
    if (seconds !== undefined) this.duration.observe(seconds);
  }

  async render(): Promise<{ contentType: string; body: string }> {
    return { contentType: this.registry.contentType, body: await this.registry.metrics() };
  }
}
