import type { ConnectorPolicy, ConnectorPolicyOverrides, SourceService } from "@ragsync/types";

/**
 * Default pipeline behaviour per connector.
 *
 * - **gmail** – stale chunks deleted, topic filter applied
 * - **drive** – stale chunks deleted
 * - **file**  – stale chunks deleted
 */
const POLICY_DEFAULTS: Record<SourceService, ConnectorPolicy> = {
  gmail: { dedupDelete: true, relevanceFilter: true },
  drive: { dedupDelete: true, relevanceFilter: false },
  file: { dedupDelete: true, relevanceFilter: false },
};

export function getDefaultPolicy(service: SourceService): ConnectorPolicy {
  return { ...POLICY_DEFAULTS[service] };
}

/**
 * Effective policy for a connector once environment overrides are applied.
 * When overrides are given, `relevanceFilterServices` is the complete list of
 * filtering services.
 */
export function getConnectorPolicy(
  service: SourceService,
  overrides?: ConnectorPolicyOverrides,
): ConnectorPolicy {
  const base = getDefaultPolicy(service);

  if (!overrides) {
    return base;
  }

  return {
    dedupDelete: base.dedupDelete && !overrides.dedupDeleteDisabled.includes(service),
    relevanceFilter: overrides.relevanceFilterServices.includes(service),
  };
}
