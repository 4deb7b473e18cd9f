import { existsSync, readFileSync, writeFileSync, appendFileSync } from "fs";
import { join } from "path";
import { sampleConfig, sampleSecret } from "@/templates/project-files.ts";
import { CONFIG_FILE_NAMES, SECRET_FILE_NAME } from "@/lib/constants.ts";

export interface InitOptions {
  cwd: string;
  name: string;
  host: string;
  user?: string;
  /** Replace existing project files instead of leaving them alone. */
  overwrite?: boolean;
}

export interface InitResult {
  written: string[];
  skipped: string[];
  gitignoreUpdated: boolean;
}

/** Project files already present in `cwd`. */
export function existingProjectFiles(cwd: string): string[] {
  return [...CONFIG_FILE_NAMES, SECRET_FILE_NAME]
    .map((name) => join(cwd, name))
    .filter((path) => existsSync(path));
}

/**
 * Append `entry` to `<cwd>/.gitignore` unless a line already ignores it.
 * Returns whether the file changed.
 */
export function ensureGitignored(cwd: string, entry: string): boolean {
  const path = join(cwd, ".gitignore");
  const current = existsSync(path) ? readFileSync(path, "utf-8") : "";
  const lines = current.split("\n").map((line) => line.trim());
  if (lines.includes(entry) || lines.includes(`/${entry}`)) return false;

  const separator = current && !current.endsWith("\n") ? "\n" : "";
  appendFileSync(path, `${separator}${entry}\n`);
  return true;
}

export function initProject(options: InitOptions): InitResult {
  const result: InitResult = {
    written: [],
    skipped: [],
    gitignoreUpdated: false,
  };

  const write = (name: string, content: string) => {
    const path = join(options.cwd, name);
    if (existsSync(path) && !options.overwrite) {
      result.skipped.push(path);
      return;
    }
    writeFileSync(path, content);
    result.written.push(path);
  };

  // An existing myjob.yml counts as the project config.
  const configName =
    CONFIG_FILE_NAMES.find((name) => existsSync(join(options.cwd, name))) ??
    CONFIG_FILE_NAMES[0];
  write(configName, sampleConfig({ name: options.name, host: options.host }));
  write(SECRET_FILE_NAME, sampleSecret({ user: options.user }));

  result.gitignoreUpdated = ensureGitignored(options.cwd, SECRET_FILE_NAME);
  return result;
}
