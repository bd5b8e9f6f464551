import fs from "fs";
import * as ini from "ini";
import { ConfigurationError } from "./errors";

const PROFILE_PREFIX = "profile ";

export interface ProfileSource {
    listProfiles(): Promise<string[]>;
}

const SECTION_LINE = /^\[([^\[\]]*)\]$/;
const KEY_LINE = /^[^=:\s][^=:]*[=:]/;

/**
 * Checks every line is blank, a comment, a `[section]` header or a
 * `key = value` pair, and returns the text with lines trimmed and dots in
 * section names escaped so `ini` keeps them as part of the name.
 */
function normalizeIni(text: string): { text: string; sections: string[] } {
    const sections: string[] = [];
    const lines = text.split(/\r?\n/).map((raw, i) => {
        const line = raw.trim();
        if (line === "" || line.startsWith(";") || line.startsWith("#")) {
            return line;
        }
        const header = SECTION_LINE.exec(line);
        if (header) {
            const name = header[1].trim();
            if (!sections.includes(name)) {
                sections.push(name);
            }
            return `[${name.replace(/\./g, "\\.")}]`;
        }
        if (KEY_LINE.test(line)) {
            return line;
        }
        throw new Error(
            `line ${i + 1}: expected "[section]" or "key = value", got "${line}"`
        );
    });
    return { text: lines.join("\n"), sections };
}

/**
 * Names of the `[profile <name>]` sections, in file order. `[default]` and
 * anything else without the prefix is ignored. Throws on a line that is
 * not INI.
 */
export function parseProfileNames(text: string): string[] {
    const normalized = normalizeIni(text);
    const parsed: { [section: string]: unknown } = ini.parse(normalized.text);
    const order = (section: string) => {
        const index = normalized.sections.indexOf(section);
        return index === -1 ? normalized.sections.length : index;
    };
    const profiles: string[] = [];
    const sections = Object.keys(parsed).sort((a, b) => order(a) - order(b));
    for (const section of sections) {
        // top-level keys outside any section come back as strings
        const value = parsed[section];
        if (typeof value !== "object" || value === null) {
            continue;
        }
        if (!section.startsWith(PROFILE_PREFIX)) {
            continue;
        }
        const name = section.slice(PROFILE_PREFIX.length).trim();
        if (name) {
            profiles.push(name);
        }
    }
    return profiles;
}

export class IniProfileSource implements ProfileSource {
    constructor(private path: string) {}

    async listProfiles(): Promise<string[]> {
        let text: string;
        try {
            text = await fs.promises.readFile(this.path, "utf8");
        } catch (err) {
            throw new ConfigurationError(
                `unable to read ${this.path}: ${err instanceof Error ? err.message : String(err)}`,
                err
            );
        }
        try {
            return parseProfileNames(text);
        } catch (err) {
            throw new ConfigurationError(
                `unable to parse ${this.path}: ${err instanceof Error ? err.message : String(err)}`,
                err
            );
        }
    }
}

export class FakeProfileSource implements ProfileSource {
    constructor(
        public profiles: string[],
        public error: ConfigurationError | null = null
    ) {}

    async listProfiles(): Promise<string[]> {
        if (this.error) {
            throw this.error;
        }
        return [...this.profiles];
    }
}
