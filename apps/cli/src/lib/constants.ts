import { homedir } from "os";
import { join } from "path";

// Local state
export const MYJOB_DIR = join(homedir(), ".myjob");
export const JOBS_DIR = join(MYJOB_DIR, "jobs");
export const SOCKETS_DIR = join(MYJOB_DIR, "sockets");
export const GLOBAL_SECRET_FILE = join(MYJOB_DIR, "secret.yaml");
export const OUTPUTS_DIR = "myjob-outputs";

// Project files
export const CONFIG_FILE_NAMES = ["myjob.yaml", "myjob.yml"] as const;
export const SECRET_FILE_NAME = "secret.yaml";

// SSH
export const SSH_CONNECT_ATTEMPTS = 3;
export const SSH_CONNECT_TIMEOUT_MS = 30_000;
export const SSH_COMMAND_TIMEOUT_MS = 120_000;

// Slurm command format strings
export const SQUEUE_FORMAT = "%T|%M|%N|%r";
export const SACCT_FIELDS = "State,ExitCode,Elapsed";
export const SINFO_NODE_FORMAT = "%N|%P|%T|%C|%m";

// Local ids
export const LOCAL_ID_ALPHABET = "23456789abcdefghjkmnpqrstuvwxyz";
export const LOCAL_ID_LENGTH = 6;
export const MIN_ID_PREFIX = 2;

// Logs
export const DEFAULT_LOG_LINES = 50;
