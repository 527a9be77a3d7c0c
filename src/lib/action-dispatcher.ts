import type { ComputeApi } from "./compute-api";
import { DEFAULT_OPTIMISTIC_EXPIRY_TICKS, DEFAULT_REBOOT_EXPIRY_TICKS } from "./constants";
import { ActionError, AuthError, describeError } from "./errors";
import { rejectionReason, targetStateFor } from "./lifecycle";
import type { StateCache } from "./state-cache";
import type { ActionOutcome, InstanceAction } from "./types";

export interface ActionDispatcherOptions {
  expiryTicks?: number;
  rebootExpiryTicks?: number;
}

/**
 * Issues start/stop/reboot requests. Local validation uses the confirmed state
 * only; once the remote API accepts, an optimistic overlay is installed and the
 * call returns without waiting for the instance to change.
 */
export class ActionDispatcher {
  private readonly expiryTicks: number;
  private readonly rebootExpiryTicks: number;

  constructor(
    private readonly api: ComputeApi,
    private readonly cache: StateCache,
    options: ActionDispatcherOptions = {}
  ) {
    this.expiryTicks = options.expiryTicks ?? DEFAULT_OPTIMISTIC_EXPIRY_TICKS;
    this.rebootExpiryTicks = options.rebootExpiryTicks ?? DEFAULT_REBOOT_EXPIRY_TICKS;
  }

  async requestAction(region: string, id: string, action: InstanceAction): Promise<ActionOutcome> {
    const instance = this.cache.get(region, id);
    if (!instance) {
      return { status: "rejected", reason: "unknown instance" };
    }

    const reason = rejectionReason(action, instance.state);
    if (reason) {
      return { status: "rejected", reason };
    }

    try {
      await this.issue(region, id, action);
    } catch (error) {
      if (error instanceof AuthError || error instanceof ActionError) {
        throw error;
      }
      throw new ActionError(describeError(error), { cause: error });
    }

    const targetState = targetStateFor(action);
    const expiry = action === "reboot" ? this.rebootExpiryTicks : this.expiryTicks;
    this.cache.applyOptimistic(region, id, targetState, expiry);
    return { status: "accepted", targetState };
  }

  private async issue(region: string, id: string, action: InstanceAction): Promise<void> {
    switch (action) {
      case "start":
        await this.api.startInstance(region, id);
        return;
      case "stop":
        await this.api.stopInstance(region, id);
        return;
      case "reboot":
        await this.api.rebootInstance(region, id);
        return;
    }
  }
}
