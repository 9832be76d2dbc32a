import { fetch as undiciFetch, type Dispatcher } from 'undici';
import { createLogger } from '../utils/log.js';

const log = createLogger('robots');

interface Rule {
  allow: boolean;
  pattern: string;
}

interface Group {
  agents: string[];
  rules: Rule[];
}

/** Parsed robots.txt. Longest matching rule wins; Allow wins a tie. */
export class RobotsRules {
  constructor(private readonly groups: Group[]) {}

  static parse(text: string): RobotsRules {
    const groups: Group[] = [];
    let current: Group | null = null;
    let lastWasAgent = false;
    for (const rawLine of text.split(/\r?\n/)) {
      const line = rawLine.replace(/#.*$/, '').trim();
      const sep = line.indexOf(':');
      if (sep < 0) continue;
      const key = line.slice(0, sep).trim().toLowerCase();
      const value = line.slice(sep + 1).trim();
      if (key === 'user-agent') {
        if (!current || !lastWasAgent) {
          current = { agents: [], rules: [] };
          groups.push(current);
        }
        current.agents.push(value.toLowerCase());
        lastWasAgent = true;
        continue;
      }
      lastWasAgent = false;
      if (!current) continue;
      if (key === 'allow' || key === 'disallow') {
        // "Disallow:" with no path allows everything
        if (value) current.rules.push({ allow: key === 'allow', pattern: value });
      }
    }
    return new RobotsRules(groups);
  }

  isAllowed(url: string, userAgent: string): boolean {
    const rules = this.rulesFor(userAgent);
    if (!rules.length) return true;
    let path: string;
    try {
      const u = new URL(url);
      path = u.pathname + u.search;
    } catch {
      return true;
    }
    let best: Rule | undefined;
    for (const rule of rules) {
      if (!matches(rule.pattern, path)) continue;
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

  private rulesFor(userAgent: string): Rule[] {
    const ua = userAgent.toLowerCase();
    const specific = this.groups.filter((g) => g.agents.some((a) => a !== '*' && a !== '' && ua.includes(a)));
    const chosen = specific.length ? specific : this.groups.filter((g) => g.agents.includes('*'));
    return chosen.flatMap((g) => g.rules);
  }
}

function matches(pattern: string, path: string): boolean {
  const anchored = pattern.endsWith('$');
  const body = anchored ? pattern.slice(0, -1) : pattern;
  const source = body
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${source}${anchored ? '$' : ''}`).test(path);
}

export interface RobotsGuardOptions {
  userAgent: string;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
}

/**
 * robots.txt lookups, fetched once per origin for the lifetime of the guard
 * (one run). Unreachable or non-2xx robots.txt allows everything.
 */
export class RobotsGuard {
  private readonly cache = new Map<string, Promise<RobotsRules | null>>();

  constructor(private readonly opts: RobotsGuardOptions) {}

  async isAllowed(url: string): Promise<boolean> {
    let origin: string;
    try {
      origin = new URL(url).origin;
    } catch {
      return true;
    }
    let pending = this.cache.get(origin);
    if (!pending) {
      pending = this.load(origin);
      this.cache.set(origin, pending);
    }
    const rules = await pending;
    return rules ? rules.isAllowed(url, this.opts.userAgent) : true;
  }

  private async load(origin: string): Promise<RobotsRules | null> {
    const robotsUrl = `${origin}/robots.txt`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.opts.timeoutMs ?? 10000);
    try {
      const res = await undiciFetch(robotsUrl, {
        headers: { 'user-agent': this.opts.userAgent },
        signal: controller.signal,
        dispatcher: this.opts.dispatcher,
      });
      if (!res.ok) {
        log.debug(`${robotsUrl} -> ${res.status}, allowing all`);
        await res.body?.cancel();
        return null;
      }
      return RobotsRules.parse(await res.text());
    } catch (e) {
      log.warn(`Could not fetch ${robotsUrl}: ${e instanceof Error ? e.message : String(e)}`);
      return null;
    } finally {
      clearTimeout(timer);
    }
  }
}
