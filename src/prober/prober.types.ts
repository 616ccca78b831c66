import type { ActiveAgreementSet } from "../agreements/active-agreement-set.js";
import type { AgreementRecord } from "../agreements/agreements.types.js";
import type { ContentUnit, ProbeResult, ProviderEndpoint } from "../common/types.js";
import type { NonActiveProbeMode } from "../config/app.config.js";

/** One (unit, provider) pair to probe. */
export interface ProbeTask {
  unit: ContentUnit;
  provider: ProviderEndpoint;
  /** Latest agreement for the pair, used for `agreementState` and `dealId`. */
  agreement?: AgreementRecord;
}

export interface ProbeRunOptions {
  providers: readonly ProviderEndpoint[];
  agreements: ActiveAgreementSet;
  /** Only units from these preparations are probed. */
  preparationIds?: readonly string[];
  /** Re-probe pairs recorded without an active agreement. */
  recheckSkipped?: boolean;
  batchSize?: number;
  concurrency?: number;
  nonActiveMode?: NonActiveProbeMode;
  /** Stops new probes from starting; in-flight probes run to completion. */
  signal?: AbortSignal;
}

export interface ProbeRunResult {
  /** Every recorded result, earlier runs included, in checkpoint order. */
  results: ProbeResult[];
  /** Pairs probed over the network during this run. */
  probed: number;
  /** Pairs recorded without a network call for lack of an active agreement. */
  skipped: number;
  /** Pairs already in the checkpoint. */
  reused: number;
  /** Pairs left pending because the run was interrupted. */
  pending: number;
  aborted: boolean;
}
