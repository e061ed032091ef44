import { readFile } from 'fs/promises'
import YAML from 'yaml';
import { BinCalendarError, configFileSchema } from './schema.js';
import type { BinCalendarConfig, ConfigFile } from './schema.js';

export const DEFAULT_CONFIG_PATH = "bin-calendar.yaml";

type Env = Record<string, string | undefined>;

// The UPRN is a secret held by whatever invokes us, so it only ever comes from the environment
export function readUprn(env: Env): string {
    const uprn = (env.UPRN ?? env.SGC_UPRN ?? "").trim();
    if (!uprn) {
        throw new BinCalendarError(
            "MissingIdentifier",
            "No UPRN supplied. Set the UPRN environment variable (or SGC_UPRN) to the property reference number.",
        );
    }
    return uprn;
}

export async function readConfigFile(path: string): Promise<ConfigFile> {
    let parsed: unknown = {};
    try {
        const contents = await readFile(path, "utf8");
        parsed = YAML.parse(contents) ?? {};
    } catch (error) {
        // If the file doesn't exist, that's fine - defaults apply
        if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
            throw new BinCalendarError("ConfigError", `Failed to read ${path}: ${error}`, { cause: error });
        }
    }

    const result = configFileSchema.safeParse(parsed);
    if (!result.success) {
        throw new BinCalendarError("ConfigError", `Failed to parse ${path}: ${result.error.message}`, { cause: result.error });
    }
    return result.data;
}

export async function loadConfig(env: Env = process.env): Promise<BinCalendarConfig> {
    const uprn = readUprn(env);
    const file = await readConfigFile(env.BIN_CALENDAR_CONFIG || DEFAULT_CONFIG_PATH);
    return {
        ...file,
        output: env.BIN_CALENDAR_OUTPUT || file.output,
        uprn,
    };
}
