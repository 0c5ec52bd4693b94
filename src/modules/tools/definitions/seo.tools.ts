/**
 * Page SEO tools; each loads the page once with default browser settings
 */

import { z } from 'zod';
import { SeoAuditService } from '../../audit/seo/seo.audit';
import { urlArg, urlParam } from '../tools.params';
import { validUrl } from '../tools.preconditions';
import { defineTool } from '../tools.registry';
import { RegisteredTool, ToolContext } from '../tools.types';
import { ToolResult } from '../../../lib/tools/tool-result';

const pageSchema = z.object({ url: urlArg });

function pageTool(
  name: string,
  description: string,
  run: (service: SeoAuditService, url: string) => Promise<ToolResult<unknown>>
): RegisteredTool {
  return defineTool({
    definition: {
      name,
      description,
      parameters: { type: 'object', properties: { url: urlParam }, required: ['url'] },
    },
    schema: pageSchema,
    preconditions: [validUrl],
    handler: (args, { browser }: ToolContext) => run(new SeoAuditService(browser), args.url),
  });
}

export const seoTools = [
  pageTool(
    'get_page_info',
    'Basic page facts: status, title, meta description, heading, image and link counts, load time.',
    (service, url) => service.getPageInfo(url)
  ),
  pageTool(
    'check_meta_tags',
    'Check presence of the standard SEO, Open Graph and Twitter meta tags and score their completeness.',
    (service, url) => service.checkMetaTags(url)
  ),
  pageTool(
    'get_images_without_alt',
    'Count images missing alt text and score image accessibility.',
    (service, url) => service.getImagesWithoutAlt(url)
  ),
  pageTool(
    'check_page_performance',
    'Navigation and paint timing plus resource counts by type from the browser.',
    (service, url) => service.checkPagePerformance(url)
  ),
  pageTool(
    'quick_seo_audit',
    'Run page info, meta tag, image alt and performance checks together with an overall SEO score.',
    (service, url) => service.quickSeoAudit(url)
  ),
];
