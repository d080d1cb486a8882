/**
 * @summary stop-guests: terminate the guest started from this working directory.
 */

import { readSession, removeSession } from "@snpctl/core";
import type { PhaseDefinition } from "../types.js";

export const stopGuests: PhaseDefinition = {
  name: "stop-guests",
  summary: "Stop all SNP guests started by snpctl",

  logDir: (config) => config.launchDir,

  failureLogs: async () => [],

  steps: (context) => [
    {
      id: "stop-guests",
      description: "Stopping guests",
      run: async () => {
        const { config } = context;
        const session = await readSession(config.launchDir);
        await context.guests.stop({
          workingDir: config.workingDir,
          image: session?.image ?? config.image,
          pid: session?.pid,
        });
        await removeSession(config.launchDir);
      },
    },
  ],
};
