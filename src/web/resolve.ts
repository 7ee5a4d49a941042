// pattern: Functional Core

import { ConfigError } from "../config/errors.js";
import { createBraveAdapter } from "./providers/brave.js";
import { createDuckDuckGoAdapter } from "./providers/duckduckgo.js";
import type { SearchProvider } from "./types.js";

export type ProviderSelection = {
  readonly explicitChoice?: string;
  readonly credential?: string;
};

export type ProviderPlan =
  | { readonly kind: "duckduckgo" }
  | { readonly kind: "brave"; readonly apiKey: string };

export type ProviderFactories = {
  readonly duckduckgo: () => SearchProvider;
  readonly brave: (apiKey: string) => SearchProvider;
};

const CHOICE_ALIASES: ReadonlyMap<string, "duckduckgo" | "brave"> = new Map([
  ["ddg", "duckduckgo"],
  ["duckduckgo", "duckduckgo"],
  ["brave", "brave"],
]);

function presentOrUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Decide which provider variant a selection resolves to.
 * Order: explicit choice, then an available credential (brave), then the duckduckgo default.
 */
export function planSearchProvider(selection: ProviderSelection): ProviderPlan {
  const choice = presentOrUndefined(selection.explicitChoice);
  const credential = presentOrUndefined(selection.credential);

  if (choice === undefined) {
    return credential === undefined ? { kind: "duckduckgo" } : { kind: "brave", apiKey: credential };
  }

  const kind = CHOICE_ALIASES.get(choice.toLowerCase());
  if (kind === undefined) {
    throw new ConfigError(`unknown provider: ${choice} (valid options: duckduckgo, brave)`);
  }

  if (kind === "duckduckgo") {
    return { kind };
  }

  if (credential === undefined) {
    throw new ConfigError(
      "credential required for this provider: brave needs an API key (--brave-api-key or BRAVE_API_KEY)"
    );
  }

  return { kind, apiKey: credential };
}

export function createDefaultProviderFactories(timeoutMs?: number): ProviderFactories {
  return {
    duckduckgo: () => createDuckDuckGoAdapter({ timeoutMs }),
    brave: (apiKey) => createBraveAdapter(apiKey, { timeoutMs }),
  };
}

export function resolveSearchProvider(
  selection: ProviderSelection,
  factories: ProviderFactories = createDefaultProviderFactories()
): SearchProvider {
  const plan = planSearchProvider(selection);
  return plan.kind === "brave" ? factories.brave(plan.apiKey) : factories.duckduckgo();
}
