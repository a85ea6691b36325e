import { existsSync } from "fs";
import { readFile, writeFile } from "fs/promises";
import dotenv from "dotenv";

/**
 * Durable key-value store the credential pool mirrors itself into.
 * Callers treat every failure as non-fatal.
 */
export interface ConfigStore {
  getValue(key: string): Promise<string | undefined>;
  setValue(key: string, value: string): Promise<void>;
}

const KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

// dotenv expands \n and \r inside double quotes only
const ESCAPE_SEQUENCE = /\\[nr]/;

function quote(value: string): string {
  if (!value.includes("'")) return `'${value}'`;
  if (!value.includes('"') && !ESCAPE_SEQUENCE.test(value)) return `"${value}"`;
  return `\`${value}\``;
}

/** The `KEY=value` line for `value`, or null when dotenv would read it back differently. */
function formatLine(key: string, value: string): string | null {
  const line = `${key}=${quote(value)}`;
  return dotenv.parse(line)[key] === value ? line : null;
}

/**
 * Store backed by a dotenv file. Writes only touch a file that already exists,
 * so a deployment configured purely through the environment is left alone.
 */
export class EnvFileStore implements ConfigStore {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  exists(): boolean {
    return existsSync(this.filePath);
  }

  async getValue(key: string): Promise<string | undefined> {
    if (!this.exists()) return undefined;
    const raw = await readFile(this.filePath, "utf-8");
    return dotenv.parse(raw)[key];
  }

  async setValue(key: string, value: string): Promise<void> {
    if (!KEY_PATTERN.test(key)) {
      throw new Error(`Invalid env key: ${key}`);
    }
    if (value.includes("\n")) {
      throw new Error(`Refusing to write multi-line value for ${key}`);
    }
    const line = formatLine(key, value);
    if (line === null) {
      throw new Error(`Value for ${key} cannot be written to an env file without changing it`);
    }
    if (!this.exists()) {
      console.log(`[env-store] ${this.filePath} not found, skipping write of ${key}`);
      return;
    }

    const raw = await readFile(this.filePath, "utf-8");
    const lines = raw.split("\n");
    const matcher = new RegExp(`^\\s*(export\\s+)?${key}\\s*=`);

    let replaced = false;
    const next = lines.map((l) => {
      if (!replaced && matcher.test(l)) {
        replaced = true;
        return line;
      }
      return l;
    });

    if (!replaced) {
      if (next.length > 0 && next[next.length - 1] === "") {
        next.splice(next.length - 1, 0, line);
      } else {
        next.push(line);
      }
    }

    await writeFile(this.filePath, next.join("\n"), "utf-8");
  }
}
