/**
 * @quire/gateway — Provider registry.
 */

import type { ProviderId } from "@quire/types";
import { ValidationError, isProviderId } from "@quire/types";
import type { PaymentProvider } from "./types.js";

export class ProviderRegistry {
  private readonly _providers = new Map<ProviderId, PaymentProvider>();

  constructor(providers: readonly PaymentProvider[] = []) {
    for (const p of providers) {
      this.register(p);
    }
  }

  register(provider: PaymentProvider): void {
    if (this._providers.has(provider.id)) {
      throw new ValidationError(`Provider "${provider.id}" is already registered`);
    }
    this._providers.set(provider.id, provider);
  }

  /** @throws ValidationError for unknown or unconfigured providers */
  get(id: string): PaymentProvider {
    const provider = isProviderId(id) ? this._providers.get(id) : undefined;
    if (provider === undefined) {
      throw new ValidationError(`Unknown payment provider "${id}"`);
    }
    return provider;
  }

  has(id: string): boolean {
    return isProviderId(id) && this._providers.has(id);
  }

  list(): readonly ProviderId[] {
    return [...this._providers.keys()];
  }
}
