import { randomInt } from "crypto";
import { LOCAL_ID_ALPHABET, LOCAL_ID_LENGTH } from "@/lib/constants.ts";

/**
 * Short, human-typeable local id. The alphabet drops 0/1/i/l/o so ids
 * survive being read aloud or copied by hand.
 */
export function generateLocalId(length: number = LOCAL_ID_LENGTH): string {
  let id = "";
  for (let i = 0; i < length; i++) {
    id += LOCAL_ID_ALPHABET.charAt(randomInt(LOCAL_ID_ALPHABET.length));
  }
  return id;
}
