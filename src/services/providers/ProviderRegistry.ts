import {
  Result,
  failure,
  ProviderReading,
  ProviderStatus,
} from "@core/types";
import { IProviderRegistry } from "@core/interfaces";
import { FetchError, NotFoundError } from "@core/errors";
import { getLogger } from "@utils/logger";
import { ProviderSlot } from "./ProviderSlot";

const logger = getLogger("ProviderRegistry");

/**
 * Fixed set of provider slots, keyed by name.
 * Built once per configuration and never modified afterwards.
 */
export class ProviderRegistry implements IProviderRegistry {
  private readonly slots: ReadonlyMap<string, ProviderSlot>;

  constructor(slots: ProviderSlot[]) {
    this.slots = new Map(slots.map((slot) => [slot.name, slot]));
  }

  async refresh(
    name: string,
  ): Promise<Result<void, FetchError | NotFoundError>> {
    const slot = this.slots.get(name);
    if (!slot) {
      return failure(NotFoundError.provider(name));
    }
    return slot.refresh();
  }

  async refreshAll(): Promise<void> {
    logger.info(`Refreshing ${this.slots.size} provider(s)`);
    const outcomes = await Promise.all(
      [...this.slots.values()].map((slot) => slot.refresh()),
    );
    const failed = outcomes.filter((outcome) => !outcome.success).length;
    if (failed > 0) {
      logger.warn(`${failed} of ${outcomes.length} provider(s) failed to refresh`);
    }
  }

  read(name: string): ProviderReading | undefined {
    return this.slots.get(name)?.read();
  }

  has(name: string): boolean {
    return this.slots.has(name);
  }

  names(): string[] {
    return [...this.slots.keys()];
  }

  getSlot(name: string): ProviderSlot | undefined {
    return this.slots.get(name);
  }

  listStatus(): ProviderStatus[] {
    return [...this.slots.values()].map((slot) => slot.getStatus());
  }
}
