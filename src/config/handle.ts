import { EventEmitter } from "node:events";
import type { Logger } from "../logger.js";
import type { KingConfigUpdate } from "../protocol/types.js";
import { deepFreeze } from "../shared/json.js";
import { gatewayConfigHash } from "./gateway.js";
import type { GatewayConfig } from "./types.js";

export interface ConfigChange<T> {
  readonly previous: T;
  readonly current: T;
  readonly hash: string;
}

export type ConfigChangeHandler<T> = (change: ConfigChange<T>) => void;

/**
 * Holds the live configuration of a process. A new configuration replaces the
 * old snapshot wholesale; snapshots are frozen, so a reader holding one never
 * sees a half-applied update.
 */
export class ConfigHandle<T> {
  private snapshot: T;
  private snapshotHash: string;
  private readonly emitter = new EventEmitter();

  constructor(
    initial: T,
    private readonly hashOf: (config: T) => string,
    private readonly logger?: Pick<Logger, "info">
  ) {
    this.snapshot = deepFreeze(initial);
    this.snapshotHash = hashOf(initial);
  }

  current(): T {
    return this.snapshot;
  }

  hash(): string {
    return this.snapshotHash;
  }

  /** Installs `next` and returns the snapshot it replaced. */
  swap(next: T): T {
    const previous = this.snapshot;
    const hash = this.hashOf(next);
    this.snapshot = deepFreeze(next);
    this.snapshotHash = hash;
    this.logger?.info({ hash }, "Configuration swapped");

    const change: ConfigChange<T> = { previous, current: this.snapshot, hash };
    this.emitter.emit("change", change);
    return previous;
  }

  /** Swaps only when `next` hashes differently from the current snapshot. */
  swapIfChanged(next: T): boolean {
    if (this.hashOf(next) === this.snapshotHash) {
      return false;
    }
    this.swap(next);
    return true;
  }

  /** True when a `king:config_update` announces a configuration other than the one held. */
  isStale(update: KingConfigUpdate): boolean {
    return update.new_config_hash !== this.snapshotHash;
  }

  onChange(handler: ConfigChangeHandler<T>): () => void {
    this.emitter.on("change", handler);
    return () => {
      this.emitter.off("change", handler);
    };
  }
}

export function createGatewayConfigHandle(
  initial: GatewayConfig,
  logger?: Pick<Logger, "info">
): ConfigHandle<GatewayConfig> {
  return new ConfigHandle(initial, gatewayConfigHash, logger);
}
