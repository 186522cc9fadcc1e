/**
 * Per-origin robots.txt permissions
 */

import {
    buildRequestHeaders,
    createSignalWithTimeout,
    DEFAULT_USER_AGENT,
    robustFetch,
} from '@webkeep/http';
import { errorMessage } from '@webkeep/utils';
import type { OnCaptureVerbose } from './types.js';

export interface RobotsRule {
    allow: boolean;
    /** Path pattern, possibly with `*` wildcards and a trailing `$` */
    pattern: string;
}

export interface RobotsGroup {
    /** Lower-cased user agent names of the group */
    agents: string[];
    rules: RobotsRule[];
}

/**
 * Permission decision for one origin.
 */
export type OriginPolicy =
    | { mode: 'allow-all' }
    | { mode: 'deny-all' }
    | { mode: 'rules'; rules: RobotsRule[] };

/**
 * Parses robots.txt into its user agent groups.
 *
 * Consecutive `User-agent` lines share one group; a `User-agent` line after a
 * rule starts a new one. Empty `Disallow` lines allow everything and carry no
 * rule.
 */
export function parseRobots(text: string): RobotsGroup[] {
    const groups: RobotsGroup[] = [];
    let current: RobotsGroup = { agents: [], rules: [] };
    let hasRulesInGroup = false;

    for (const rawLine of text.split(/\r?\n/)) {
        const line = rawLine.split('#')[0].trim();
        if (!line) continue;

        const colon = line.indexOf(':');
        if (colon === -1) continue;

        const field = line.slice(0, colon).trim().toLowerCase();
        const value = line.slice(colon + 1).trim();

        if (field === 'user-agent') {
            if (hasRulesInGroup) {
                groups.push(current);
                current = { agents: [], rules: [] };
                hasRulesInGroup = false;
            }
            if (value) current.agents.push(value.toLowerCase());
            continue;
        }

        if (field === 'allow' || field === 'disallow') {
            hasRulesInGroup = true;
            if (value) {
                current.rules.push({ allow: field === 'allow', pattern: value });
            }
        }
    }

    if (current.agents.length > 0) groups.push(current);

    return groups.filter((group) => group.agents.length > 0);
}

/**
 * Returns the robots.txt product token of a user agent string:
 * `WebKeep/2.0 (+https://example.com)` gives `webkeep`.
 */
export function agentToken(userAgent: string): string {
    return userAgent.trim().split(/[\s/]/)[0].toLowerCase();
}

/**
 * Picks the rules that apply to an agent. Groups naming the agent win over
 * the `*` group; several matching groups are merged.
 */
export function selectRules(groups: RobotsGroup[], token: string): RobotsRule[] {
    const specific = groups.filter((group) =>
        group.agents.some((agent) => agent !== '*' && token.includes(agent)),
    );
    if (specific.length > 0) {
        return specific.flatMap((group) => group.rules);
    }
    return groups
        .filter((group) => group.agents.includes('*'))
        .flatMap((group) => group.rules);
}

function patternToRegExp(pattern: string): RegExp {
    const anchored = pattern.endsWith('$');
    const body = anchored ? pattern.slice(0, -1) : pattern;
    const source = body
        .split('*')
        .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
        .join('.*');
    return new RegExp(`^${source}${anchored ? '$' : ''}`);
}

/**
 * Checks whether a robots.txt path pattern matches a path (with query).
 */
export function patternMatches(pattern: string, path: string): boolean {
    if (!pattern.includes('*') && !pattern.endsWith('$')) {
        return path.startsWith(pattern);
    }
    return patternToRegExp(pattern).test(path);
}

/**
 * Applies rules to a path: the longest matching pattern decides and Allow
 * wins a tie. No match means allowed.
 */
export function isPathAllowed(rules: RobotsRule[], path: string): boolean {
    let best: RobotsRule | null = null;

    for (const rule of rules) {
        if (!patternMatches(rule.pattern, path)) continue;
        if (
            !best ||
            rule.pattern.length > best.pattern.length ||
            (rule.pattern.length === best.pattern.length && rule.allow)
        ) {
            best = rule;
        }
    }

    return best ? best.allow : true;
}

/**
 * Options for {@link FetchPolicyCache}
 */
export interface FetchPolicyOptions {
    /** User agent sent with robots.txt requests and matched against groups */
    userAgent?: string;
    /** Timeout for each robots.txt request in milliseconds */
    timeout?: number;
    /** Retry attempts for transient failures */
    retries?: number;
    /** Structured verbose callback */
    onVerbose?: OnCaptureVerbose;
}

/**
 * Caches robots.txt decisions per origin for the lifetime of the process.
 *
 * Concurrent lookups for the same origin share one in-flight retrieval, so
 * robots.txt is requested at most once per origin between calls to
 * {@link FetchPolicyCache.clear}.
 */
export class FetchPolicyCache {
    private readonly origins = new Map<string, Promise<OriginPolicy>>();
    private readonly userAgent: string;
    private readonly token: string;
    private readonly timeout: number;
    private readonly retries: number | undefined;
    private readonly onVerbose?: OnCaptureVerbose;

    constructor(options: FetchPolicyOptions = {}) {
        this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
        this.token = agentToken(this.userAgent);
        this.timeout = options.timeout ?? 30_000;
        this.retries = options.retries;
        this.onVerbose = options.onVerbose;
    }

    /**
     * Whether the configured agent may fetch a URL. URLs that are not http(s)
     * are always allowed.
     */
    async allowed(url: string): Promise<boolean> {
        let parsed: URL;
        try {
            parsed = new URL(url);
        } catch {
            return true;
        }
        if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
            return true;
        }

        const policy = await this.policyFor(parsed.origin);
        switch (policy.mode) {
            case 'allow-all':
                return true;
            case 'deny-all':
                return false;
            case 'rules':
                return isPathAllowed(
                    policy.rules,
                    `${parsed.pathname}${parsed.search}`,
                );
        }
    }

    /**
     * Drops every cached decision.
     */
    clear(): void {
        this.origins.clear();
    }

    private policyFor(origin: string): Promise<OriginPolicy> {
        let pending = this.origins.get(origin);
        if (!pending) {
            pending = this.load(origin);
            this.origins.set(origin, pending);
        }
        return pending;
    }

    private async load(origin: string): Promise<OriginPolicy> {
        const robotsUrl = `${origin}/robots.txt`;

        try {
            const response = await robustFetch(robotsUrl, {
                headers: buildRequestHeaders(this.userAgent, 'text/plain'),
                signal: createSignalWithTimeout(this.timeout),
                retries: this.retries,
            });

            if (response.status === 401 || response.status === 403) {
                await response.body?.cancel();
                this.log('info', `robots.txt of ${origin} is restricted, denying all`);
                return { mode: 'deny-all' };
            }

            if (response.status >= 400 && response.status < 500) {
                await response.body?.cancel();
                return { mode: 'allow-all' };
            }

            if (!response.ok) {
                await response.body?.cancel();
                this.log(
                    'warn',
                    `robots.txt of ${origin} answered ${response.status}, allowing all`,
                );
                return { mode: 'allow-all' };
            }

            const rules = selectRules(parseRobots(await response.text()), this.token);
            this.log('debug', `Loaded ${rules.length} robots.txt rules for ${origin}`);
            return { mode: 'rules', rules };
        } catch (error) {
            this.log(
                'warn',
                `Could not read robots.txt of ${origin}, allowing all: ${errorMessage(error)}`,
            );
            return { mode: 'allow-all' };
        }
    }

    private log(
        level: 'debug' | 'info' | 'warn',
        message: string,
    ): void {
        this.onVerbose?.({ type: 'verbose', level, source: 'policy', message });
    }
}
