import fs from 'node:fs';
import yaml from 'js-yaml';
import { z } from 'zod';

const OutletFileSchema = z.object({
    domains: z.record(z.string()),
    priority: z.record(z.number()),
    noiseTokens: z.array(z.string()),
    localeTokens: z.array(z.string()),
    tldSuffixes: z.array(z.string()),
});

export type OutletTable = {
    /** Known domains, longest first so the first suffix hit is the longest. */
    domains: Array<[string, string]>;
    priority: Map<string, number>;
    noise: Set<string>;
    locales: Set<string>;
    tlds: Set<string>;
};

const DEFAULT_FILE = new URL('../configs/outlets.yaml', import.meta.url);

/**
 * Load the domain → outlet table from YAML.
 * Keys are lower-cased; a missing or malformed file throws, since the table is required data.
 */
export function loadOutletTable(file: URL | string = DEFAULT_FILE): OutletTable {
    const parsed = OutletFileSchema.parse(yaml.load(fs.readFileSync(file, 'utf-8')));
    const domains = Object.entries(parsed.domains)
        .map(([domain, name]): [string, string] => [domain.toLowerCase(), name])
        .sort((a, b) => b[0].length - a[0].length || a[0].localeCompare(b[0]));
    return {
        domains,
        priority: new Map(Object.entries(parsed.priority)),
        noise: new Set(parsed.noiseTokens.map((t) => t.toLowerCase())),
        locales: new Set(parsed.localeTokens.map((t) => t.toLowerCase())),
        tlds: new Set(parsed.tldSuffixes.map((t) => t.toLowerCase())),
    };
}

let defaultTable: OutletTable | undefined;

export function outletTable(): OutletTable {
    if (!defaultTable) defaultTable = loadOutletTable();
    return defaultTable;
}

function hostOf(domain: string): string {
    return domain.trim().replace(/^[a-z]+:\/\//i, '').split(/[/?#:]/)[0].replace(/\.+$/, '');
}

/** Display name for a source domain: table match (exact or longest suffix), else a name built from the host. */
export function resolveOutlet(domain: string, table: OutletTable = outletTable()): string {
    const host = hostOf(domain);
    if (!host) return 'Unknown';
    const lower = host.toLowerCase().replace(/^www\./, '');
    for (const [known, name] of table.domains) {
        if (lower === known || lower.endsWith('.' + known)) return name;
    }
    return fallbackOutletName(host, table);
}

export function fallbackOutletName(host: string, table: OutletTable = outletTable()): string {
    let parts = host.split('.').filter((p) => p && !table.noise.has(p.toLowerCase()));
    while (parts.length > 1 && table.locales.has(parts[0].toLowerCase())) parts = parts.slice(1);
    while (parts.length > 1 && table.tlds.has(parts[parts.length - 1].toLowerCase())) parts = parts.slice(0, -1);
    const label = parts.length ? parts[parts.length - 1] : host.split('.')[0];
    const name = titleCase(label.replace(/([a-z])([A-Z])/g, '$1 $2').replace(/[-_]+/g, ' '));
    return name || 'Unknown';
}

export function titleCase(s: string): string {
    return s
        .split(/\s+/)
        .filter(Boolean)
        .map((w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase())
        .join(' ');
}

export function outletPriority(outlet: string, table: OutletTable = outletTable()): number {
    return table.priority.get(outlet) ?? 0;
}
