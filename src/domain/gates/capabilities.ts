import { CapabilityUnavailable } from "../../core/errors.js";
import { logInfo } from "../../core/logging.js";

/** Tools that only exist with elevated privileges (kernel tracing, preload injection). */
export const PRIVILEGED_ONLY_CAPABILITIES: ReadonlySet<string> = new Set([
  "dtrace",
  "bpftrace",
  "ebpf",
  "ld_preload",
]);

export interface CapabilityProfile {
  privileged: boolean;
  capabilities: readonly string[];
}

/** Full access: every declared tool is usable. */
export class PrivilegedCapability {
  readonly kind = "privileged" as const;
  private readonly available: ReadonlySet<string>;

  constructor(available: Iterable<string>) {
    this.available = new Set([...available].map((c) => c.toLowerCase()));
  }

  require(name: string): void {
    if (!this.available.has(name.toLowerCase())) {
      throw new CapabilityUnavailable(name, "not declared for this run");
    }
  }

  list(): string[] {
    return [...this.available].sort();
  }
}

/**
 * Fallback without elevated privileges. Declared tools are usable except
 * the privileged-only ones, whose checks resolve to SKIP.
 */
export class SimulatorCapability {
  readonly kind = "simulator" as const;
  private readonly available: ReadonlySet<string>;

  constructor(available: Iterable<string>) {
    this.available = new Set([...available].map((c) => c.toLowerCase()));
  }

  require(name: string): void {
    const key = name.toLowerCase();
    if (PRIVILEGED_ONLY_CAPABILITIES.has(key)) {
      throw new CapabilityUnavailable(name, "requires privileged mode; running with the simulator");
    }
    if (!this.available.has(key)) {
      throw new CapabilityUnavailable(name, "not declared for this run");
    }
  }

  list(): string[] {
    return [...this.available].filter((c) => !PRIVILEGED_ONLY_CAPABILITIES.has(c)).sort();
  }
}

export type Capability = PrivilegedCapability | SimulatorCapability;

/** Chosen once per run and injected; never re-probed during evaluation. */
export function selectCapability(profile: CapabilityProfile): Capability {
  const capability = profile.privileged
    ? new PrivilegedCapability(profile.capabilities)
    : new SimulatorCapability(profile.capabilities);
  logInfo(
    `Gate capability: ${capability.kind} [${capability.list().join(", ") || "none"}]`,
  );
  return capability;
}
