/**
 * AgentRegistry: one orchestrator per monitored address.
 */

import type { WalletAddress } from "@stellar-compass/types";
import { AgentOrchestrator } from "./orchestrator.js";
import type { OrchestratorDeps } from "./orchestrator.js";
import { AgentError } from "./types.js";
import type { AgentSettings } from "./types.js";

export class AgentRegistry {
  private readonly orchestrators = new Map<WalletAddress, AgentOrchestrator>();

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly defaultSettings: AgentSettings,
  ) {}

  /**
   * Start monitoring an address. Activating an address that is already
   * monitored applies the settings to the running orchestrator.
   */
  activate(address: WalletAddress, settings: Partial<AgentSettings> = {}): AgentOrchestrator {
    const existing = this.orchestrators.get(address);
    if (existing !== undefined) {
      existing.updateSettings(settings);
      return existing;
    }

    const orchestrator = new AgentOrchestrator(address, this.defaultSettings, this.deps);
    orchestrator.updateSettings(settings);
    orchestrator.activate();
    this.orchestrators.set(address, orchestrator);
    return orchestrator;
  }

  deactivate(address: WalletAddress): void {
    this.require(address).deactivate();
    this.orchestrators.delete(address);
  }

  /**
   * @throws AgentError AGENTS_NOT_ACTIVE when the address is not monitored
   */
  require(address: WalletAddress): AgentOrchestrator {
    const orchestrator = this.orchestrators.get(address);
    if (orchestrator === undefined) {
      throw new AgentError("AGENTS_NOT_ACTIVE", `No active agents for ${address}`);
    }
    return orchestrator;
  }

  has(address: WalletAddress): boolean {
    return this.orchestrators.has(address);
  }

  addresses(): readonly WalletAddress[] {
    return [...this.orchestrators.keys()];
  }

  stopAll(): void {
    for (const orchestrator of this.orchestrators.values()) orchestrator.deactivate();
    this.orchestrators.clear();
  }
}
