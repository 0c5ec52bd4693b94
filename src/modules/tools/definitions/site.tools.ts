/**
 * Site audit tools: crawl, speed, structured data, links, accessibility,
 * robots.txt and HTTPS
 */

import { z } from 'zod';
import { SiteCrawler } from '../../../lib/crawling';
import { AccessibilityAuditService } from '../../audit/accessibility/accessibility.audit';
import { HttpsAuditService } from '../../audit/https/https.audit';
import { ExternalLinksAuditService } from '../../audit/links/external-links.audit';
import { InternalLinksAuditService } from '../../audit/links/internal-links.audit';
import { LinkChecker } from '../../audit/links/link-checker';
import { RobotsAuditService } from '../../audit/robots/robots.audit';
import { SchemaAuditService } from '../../audit/schema/schema.audit';
import { SpeedAuditService } from '../../audit/speed/speed.audit';
import {
  countArg,
  countParam,
  delayArg,
  delayParam,
  headlessArg,
  headlessParam,
  secondsArg,
  secondsParam,
  urlArg,
  urlParam,
} from '../tools.params';
import { lighthouseInstalled, validUrl } from '../tools.preconditions';
import { defineTool } from '../tools.registry';

const PAGE_TIMEOUT_PARAM = secondsParam('Page load timeout in seconds', 30);
const LINK_TIMEOUT_PARAM = secondsParam('Per-link request timeout in seconds', 10);

const renderedPageSchema = z.object({
  url: urlArg,
  headless: headlessArg,
  timeout: secondsArg(30),
});

const renderedPageParameters = {
  type: 'object' as const,
  properties: { url: urlParam, headless: headlessParam, timeout: PAGE_TIMEOUT_PARAM },
  required: ['url'],
};

const fetchedUrlSchema = z.object({
  url: urlArg,
  timeout: secondsArg(10),
});

const fetchedUrlParameters = {
  type: 'object' as const,
  properties: { url: urlParam, timeout: secondsParam('Request timeout in seconds', 10) },
  required: ['url'],
};

export const crawlSiteTool = defineTool({
  definition: {
    name: 'crawl_site',
    description:
      'Crawl a website breadth-first within its host and report every visited page with its title, links, resources and metadata.',
    parameters: {
      type: 'object',
      properties: {
        url: urlParam,
        max_pages: countParam('Maximum number of pages to visit (capped at 100)', 10),
        headless: headlessParam,
        wait_time: delayParam('Pause after each page load in seconds', 2),
        timeout: PAGE_TIMEOUT_PARAM,
      },
      required: ['url'],
    },
  },
  schema: z.object({
    url: urlArg,
    max_pages: countArg(10),
    headless: headlessArg,
    wait_time: delayArg(2),
    timeout: secondsArg(30),
  }),
  preconditions: [validUrl],
  handler: (args, { browser }) =>
    new SiteCrawler(browser).crawl(args.url, {
      maxPages: args.max_pages,
      headless: args.headless,
      waitTimeSeconds: args.wait_time,
      timeoutSeconds: args.timeout,
    }),
});

export const auditSpeedTool = defineTool({
  definition: {
    name: 'audit_speed',
    description: 'Measure page speed with Lighthouse: overall performance score and core web vitals.',
    parameters: {
      type: 'object',
      properties: { url: urlParam, timeout: secondsParam('Lighthouse run timeout in seconds', 120) },
      required: ['url'],
    },
  },
  schema: z.object({ url: urlArg, timeout: secondsArg(120) }),
  preconditions: [validUrl, lighthouseInstalled],
  handler: (args, { lighthouse }) => new SpeedAuditService(lighthouse).audit(args.url, args.timeout),
});

export const checkSchemaTool = defineTool({
  definition: {
    name: 'check_schema',
    description: 'Extract and validate JSON-LD, Microdata and RDFa structured data from a rendered page.',
    parameters: renderedPageParameters,
  },
  schema: renderedPageSchema,
  preconditions: [validUrl],
  handler: (args, { browser }) =>
    new SchemaAuditService(browser).audit(args.url, { headless: args.headless, timeoutSeconds: args.timeout }),
});

export const checkExternalLinksTool = defineTool({
  definition: {
    name: 'check_external_links',
    description: 'Check the external links on a page for broken, redirected, slow or unreachable targets.',
    parameters: {
      type: 'object',
      properties: {
        url: urlParam,
        headless: headlessParam,
        timeout: PAGE_TIMEOUT_PARAM,
        link_timeout: LINK_TIMEOUT_PARAM,
        max_links: countParam('Maximum number of external links to check', 50),
      },
      required: ['url'],
    },
  },
  schema: renderedPageSchema.extend({ link_timeout: secondsArg(10), max_links: countArg(50) }),
  preconditions: [validUrl],
  handler: (args, { browser, http, sleep }) =>
    new ExternalLinksAuditService(browser, new LinkChecker(http, sleep)).audit(args.url, {
      headless: args.headless,
      timeoutSeconds: args.timeout,
      linkTimeoutSeconds: args.link_timeout,
      maxLinks: args.max_links,
    }),
});

export const auditAccessibilityTool = defineTool({
  definition: {
    name: 'audit_accessibility',
    description: 'Audit alt text, color contrast, ARIA labelling, heading structure and skip links on a page.',
    parameters: renderedPageParameters,
  },
  schema: renderedPageSchema,
  preconditions: [validUrl],
  handler: (args, { browser }) =>
    new AccessibilityAuditService(browser).audit(args.url, { headless: args.headless, timeoutSeconds: args.timeout }),
});

export const checkRobotsTxtTool = defineTool({
  definition: {
    name: 'check_robots_txt',
    description: "Fetch, parse and analyze the site's robots.txt for crawl rules, sitemaps and syntax problems.",
    parameters: fetchedUrlParameters,
  },
  schema: fetchedUrlSchema,
  preconditions: [validUrl],
  handler: (args, { http }) => new RobotsAuditService(http).audit(args.url, args.timeout),
});

export const checkHttpsUsageTool = defineTool({
  definition: {
    name: 'check_https_usage',
    description: 'Check HTTPS availability, HTTP to HTTPS redirection and the TLS certificate of a site.',
    parameters: fetchedUrlParameters,
  },
  schema: fetchedUrlSchema,
  preconditions: [validUrl],
  handler: (args, { http, certificates, now }) =>
    new HttpsAuditService(http, certificates, now).audit(args.url, args.timeout),
});

export const checkInternalLinkingTool = defineTool({
  definition: {
    name: 'check_internal_linking',
    description: 'Analyze internal link structure, navigation and breadcrumbs, and validate internal links.',
    parameters: {
      type: 'object',
      properties: {
        url: urlParam,
        headless: headlessParam,
        timeout: PAGE_TIMEOUT_PARAM,
        link_timeout: LINK_TIMEOUT_PARAM,
        max_links: countParam('Maximum number of internal links to validate', 100),
      },
      required: ['url'],
    },
  },
  schema: renderedPageSchema.extend({ link_timeout: secondsArg(10), max_links: countArg(100) }),
  preconditions: [validUrl],
  handler: (args, { browser, http, sleep }) =>
    new InternalLinksAuditService(browser, new LinkChecker(http, sleep)).audit(args.url, {
      headless: args.headless,
      timeoutSeconds: args.timeout,
      linkTimeoutSeconds: args.link_timeout,
      maxLinks: args.max_links,
    }),
});

export const siteTools = [
  crawlSiteTool,
  auditSpeedTool,
  checkSchemaTool,
  checkExternalLinksTool,
  auditAccessibilityTool,
  checkRobotsTxtTool,
  checkHttpsUsageTool,
  checkInternalLinkingTool,
];
