import { deriveKeysFromHex } from "@spooltag/shared";

import { formatKeys } from "../../lib/format.js";
import { reportFailure } from "./common.js";

export type DeriveKeysCommandArgs = {
  uid?: string;
  json?: boolean;
};

/**
 * Print the sixteen sector keys of a uid. Works offline.
 */
export async function run(argv: DeriveKeysCommandArgs): Promise<void> {
  try {
    const keys = await deriveKeysFromHex(argv.uid ?? "");
    if (argv.json) {
      console.info(JSON.stringify(keys));
      return;
    }
    for (const line of formatKeys(keys)) {
      console.info(line);
    }
  } catch (error) {
    reportFailure("Key derivation failed", error);
  }
}
