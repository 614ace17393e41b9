import { UnknownVenueError } from "../core/errors";
import { type EngineConfig } from "../engine/config";
import { JupiterClient } from "../jupiter/jupiterClient";
import { UniswapV2Client } from "../uniswap/uniswapV2Client";
import { UniswapV3Client } from "../uniswap/uniswapV3Client";
import { type DexClient } from "./types";

export type VenueFactory = (config: EngineConfig, chain: string) => DexClient;

/**
 * Maps venue names to client factories. Callers pick a venue by name at run
 * time; unknown names fail with the list of registered ones.
 */
export class VenueRegistry {
  private readonly factories = new Map<string, VenueFactory>();

  register(name: string, factory: VenueFactory): this {
    this.factories.set(name, factory);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  names(): string[] {
    return [...this.factories.keys()];
  }

  create(name: string, config: EngineConfig, chain: string): DexClient {
    const factory = this.factories.get(name);
    if (!factory) throw new UnknownVenueError(name, this.names());
    return factory(config, chain);
  }
}

export function createDefaultRegistry(): VenueRegistry {
  return new VenueRegistry()
    .register("uniswap_v2", UniswapV2Client.fromConfig)
    .register("uniswap_v3", UniswapV3Client.fromConfig)
    .register("jupiter", JupiterClient.fromConfig);
}
