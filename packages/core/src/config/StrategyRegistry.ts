// packages/core/src/config/StrategyRegistry.ts
import type { ReadStrategy } from "../types/index.js";
import { StrategyError } from "../errors/index.js";

export class StrategyRegistry {
  private static readonly byName = new Map<string, ReadStrategy>();

  static register(s: ReadStrategy): void {
    if (this.byName.has(s.name)) throw new StrategyError(`Strategy ${s.name} already registered`);
    this.byName.set(s.name, s);
  }
  static get(name: string): ReadStrategy {
    const s = this.byName.get(name);
    if (!s) throw new StrategyError(`Unknown read strategy: ${name}`);
    return s;
  }
  static get names(): string[] { return [...this.byName.keys()]; }
}
