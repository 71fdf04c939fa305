/**
 * Payment providers from process configuration.
 *
 * A provider is registered only when its credentials are complete; a
 * webhook for an unregistered provider is answered 404.
 */

import type { Logger } from "pino";
import type { Clock } from "@quire/types";
import type { FetchFn, PaymentProvider } from "@quire/gateway";
import { CardProvider, MobileMoneyAProvider, MobileMoneyBProvider } from "@quire/gateway";
import type { AppConfig } from "../config.js";

export interface ProviderDeps {
  readonly clock?: Clock;
  readonly fetchFn?: FetchFn;
  readonly logger?: Logger;
}

type ProviderSettings = Pick<
  AppConfig,
  | "CARD_WEBHOOK_SECRET"
  | "CARD_API_KEY"
  | "CARD_API_URL"
  | "MOMO_A_WEBHOOK_TOKEN"
  | "MOMO_A_API_KEY"
  | "MOMO_A_API_URL"
  | "MOMO_B_PUBLIC_KEY_PEM"
  | "MOMO_B_API_KEY"
  | "MOMO_B_API_URL"
  | "WEBHOOK_TOLERANCE_SECONDS"
>;

export function buildProviders(config: ProviderSettings, deps: ProviderDeps = {}): PaymentProvider[] {
  const providers: PaymentProvider[] = [];
  const fetchOption = deps.fetchFn !== undefined ? { fetchFn: deps.fetchFn } : {};

  if (config.CARD_WEBHOOK_SECRET !== undefined && config.CARD_API_KEY !== undefined) {
    providers.push(
      new CardProvider({
        apiUrl: config.CARD_API_URL,
        apiKey: config.CARD_API_KEY,
        webhookSecret: config.CARD_WEBHOOK_SECRET,
        toleranceSeconds: config.WEBHOOK_TOLERANCE_SECONDS,
        ...(deps.clock !== undefined ? { clock: deps.clock } : {}),
        ...fetchOption,
      }),
    );
  } else {
    deps.logger?.warn({ provider: "card" }, "Provider credentials incomplete, provider disabled");
  }

  if (config.MOMO_A_WEBHOOK_TOKEN !== undefined && config.MOMO_A_API_KEY !== undefined) {
    providers.push(
      new MobileMoneyAProvider({
        apiUrl: config.MOMO_A_API_URL,
        apiKey: config.MOMO_A_API_KEY,
        webhookToken: config.MOMO_A_WEBHOOK_TOKEN,
        ...fetchOption,
      }),
    );
  } else {
    deps.logger?.warn({ provider: "mobile_money_a" }, "Provider credentials incomplete, provider disabled");
  }

  if (config.MOMO_B_PUBLIC_KEY_PEM !== undefined && config.MOMO_B_API_KEY !== undefined) {
    providers.push(
      new MobileMoneyBProvider({
        apiUrl: config.MOMO_B_API_URL,
        apiKey: config.MOMO_B_API_KEY,
        // Env files carry PEM line breaks as "\n"
        publicKeyPem: config.MOMO_B_PUBLIC_KEY_PEM.replace(/\\n/g, "\n"),
        ...fetchOption,
      }),
    );
  } else {
    deps.logger?.warn({ provider: "mobile_money_b" }, "Provider credentials incomplete, provider disabled");
  }

  return providers;
}
