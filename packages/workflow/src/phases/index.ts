import type { PhaseDefinition, PhaseName } from "../types.js";
import { attestGuest } from "./attest-guest.js";
import { launchGuest } from "./launch-guest.js";
import { setupHost } from "./setup-host.js";
import { stopGuests } from "./stop-guests.js";

export const PHASE_DEFINITIONS: Readonly<Record<PhaseName, PhaseDefinition>> = {
  "setup-host": setupHost,
  "launch-guest": launchGuest,
  "attest-guest": attestGuest,
  "stop-guests": stopGuests,
};

export { setupHost, launchGuest, attestGuest, stopGuests };
export { FirstBootProvisioner, type FirstBootState } from "./first-boot.js";
export {
  AttestationRun,
  ATTESTATION_TRANSITIONS,
  isTerminalAttestationState,
  type AttestationState,
} from "./attest-guest.js";
export { SNP_ACTIVE_PATTERN } from "./launch-guest.js";
