/**
 * robots.txt Parser
 * Line-oriented; comments are stripped and every problem is reported
 * with its 1-based line number
 */

import { ParsedRobotsTxt, UserAgentRules } from './robots.types';

export function emptyRobotsTxt(): ParsedRobotsTxt {
  return {
    user_agents: {},
    sitemaps: [],
    crawl_delay: {},
    host: null,
    total_rules: 0,
    warnings: [],
    errors: [],
  };
}

function isAbsoluteUrl(value: string): boolean {
  return value.startsWith('http://') || value.startsWith('https://');
}

export function parseRobotsTxt(content: string): ParsedRobotsTxt {
  const parsed = emptyRobotsTxt();
  if (!content) {
    return parsed;
  }

  const groups = new Map<string, UserAgentRules>();
  let currentAgent: string | null = null;

  content
    .trim()
    .split('\n')
    .forEach((rawLine, index) => {
      const lineNumber = index + 1;
      const line = rawLine.split('#')[0].trim();
      if (!line) {
        return;
      }

      const colon = line.indexOf(':');
      if (colon === -1) {
        parsed.errors.push({ line: lineNumber, content: line, error: 'Invalid syntax: missing colon' });
        return;
      }

      const directive = line.slice(0, colon).trim().toLowerCase();
      const value = line.slice(colon + 1).trim();

      if (!value && directive !== 'user-agent') {
        parsed.warnings.push({ line: lineNumber, content: line, warning: 'Empty value for directive' });
        return;
      }

      switch (directive) {
        case 'user-agent': {
          currentAgent = value || '*';
          if (!groups.has(currentAgent)) {
            groups.set(currentAgent, { allow: [], disallow: [], crawl_delay: null });
          }
          parsed.total_rules++;
          break;
        }

        case 'allow':
        case 'disallow': {
          const group = currentAgent === null ? undefined : groups.get(currentAgent);
          if (!group) {
            const name = directive === 'allow' ? 'Allow' : 'Disallow';
            parsed.errors.push({ line: lineNumber, content: line, error: `${name} directive without User-agent` });
            return;
          }
          group[directive].push(value);
          parsed.total_rules++;
          break;
        }

        case 'crawl-delay': {
          const group = currentAgent === null ? undefined : groups.get(currentAgent);
          if (currentAgent === null || !group) {
            parsed.errors.push({
              line: lineNumber,
              content: line,
              error: 'Crawl-delay directive without User-agent',
            });
            return;
          }
          const delay = Number(value);
          if (Number.isNaN(delay)) {
            parsed.errors.push({
              line: lineNumber,
              content: line,
              error: 'Invalid crawl-delay value: must be a number',
            });
            return;
          }
          group.crawl_delay = delay;
          parsed.crawl_delay[currentAgent] = delay;
          parsed.total_rules++;
          break;
        }

        case 'sitemap':
          if (!isAbsoluteUrl(value)) {
            parsed.warnings.push({
              line: lineNumber,
              content: line,
              warning: 'Sitemap URL should be absolute (include http/https)',
            });
          }
          parsed.sitemaps.push(value);
          parsed.total_rules++;
          break;

        case 'host':
          parsed.host = value;
          parsed.total_rules++;
          break;

        default:
          parsed.warnings.push({ line: lineNumber, content: line, warning: `Unknown directive: ${directive}` });
      }
    });

  parsed.user_agents = Object.fromEntries(groups);
  return parsed;
}
