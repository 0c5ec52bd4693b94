/**
 * Structured Data Extractors
 * JSON-LD, Microdata and RDFa read from a parsed DOM snapshot
 */

import type { CheerioAPI } from 'cheerio';
import { errorMessage } from '../../../lib/tools/tool-result';
import {
  JsonLdError,
  JsonLdItem,
  MicrodataItem,
  MicrodataValue,
  RdfaItem,
  SchemaValidation,
  StructuredDataItem,
} from './schema.types';

const RDFA_SELECTORS = ['[typeof]', '[about]', '[property]', '[resource]', '[vocab]', '[prefix]'];

const RDFA_ATTRIBUTES = [
  'typeof',
  'about',
  'property',
  'resource',
  'vocab',
  'prefix',
  'content',
  'datatype',
  'rel',
  'rev',
];

const MAX_SCHEMA_TYPES = 10;

// ============================================================================
// JSON-LD
// ============================================================================

export function extractJsonLd($: CheerioAPI): Array<JsonLdItem | JsonLdError> {
  const items: Array<JsonLdItem | JsonLdError> = [];

  $('script[type="application/ld+json"]').each((_, element) => {
    const raw = $(element).text().trim();
    if (!raw) return;

    try {
      items.push({ type: 'json-ld', data: JSON.parse(raw), raw });
    } catch (error) {
      items.push({ type: 'json-ld', error: `Invalid JSON-LD: ${errorMessage(error)}`, raw });
    }
  });

  return items;
}

// ============================================================================
// Microdata
// ============================================================================

type CheerioNode = ReturnType<CheerioAPI>;

function microdataValue(node: CheerioNode): string {
  if (node.is('meta')) return node.attr('content') || '';
  if (node.is('img, audio, video, source, embed')) return node.attr('src') || '';
  if (node.is('a, link, area')) return node.attr('href') || '';
  if (node.is('time')) return node.attr('datetime') || node.text();
  return node.text();
}

/**
 * Every `[itemscope]` with at least one property; nested properties
 * count toward each enclosing scope, repeated names become arrays
 */
export function extractMicrodata($: CheerioAPI): MicrodataItem[] {
  const items: MicrodataItem[] = [];

  $('[itemscope]').each((_, scope) => {
    const properties: Record<string, MicrodataValue> = {};

    $(scope)
      .find('[itemprop]')
      .each((__, element) => {
        const node = $(element);
        const name = node.attr('itemprop');
        if (!name) return;

        const value = microdataValue(node).trim();
        const existing = properties[name];
        if (existing === undefined) {
          properties[name] = value;
        } else if (Array.isArray(existing)) {
          existing.push(value);
        } else {
          properties[name] = [existing, value];
        }
      });

    if (Object.keys(properties).length > 0) {
      items.push({
        type: 'microdata',
        itemtype: $(scope).attr('itemtype') || '',
        properties,
      });
    }
  });

  return items;
}

// ============================================================================
// RDFa
// ============================================================================

function sameAttributes(a: Record<string, string>, b: Record<string, string>): boolean {
  const keysA = Object.keys(a);
  const keysB = Object.keys(b);
  return keysA.length === keysB.length && keysA.every((key) => a[key] === b[key]);
}

export function extractRdfa($: CheerioAPI): RdfaItem[] {
  const items: RdfaItem[] = [];

  for (const selector of RDFA_SELECTORS) {
    $(selector).each((_, element) => {
      const node = $(element);
      const attributes: Record<string, string> = {};

      for (const attribute of RDFA_ATTRIBUTES) {
        const value = node.attr(attribute);
        if (value) {
          attributes[attribute] = value;
        }
      }

      if (Object.keys(attributes).length === 0) return;

      const content = node.text();
      const duplicate = items.some(
        (existing) => existing.content === content && sameAttributes(existing.attributes, attributes)
      );
      if (!duplicate) {
        items.push({ type: 'rdfa', attributes, content });
      }
    });
  }

  return items;
}

// ============================================================================
// Validation
// ============================================================================

function addJsonLdTypes(types: Set<string>, value: unknown): void {
  if (typeof value !== 'object' || value === null || !('@type' in value)) return;

  const schemaType = value['@type'];
  if (Array.isArray(schemaType)) {
    for (const entry of schemaType) {
      types.add(String(entry));
    }
  } else {
    types.add(String(schemaType));
  }
}

export function validateSchemaData(items: StructuredDataItem[]): SchemaValidation {
  const validation: SchemaValidation = {
    total_items: items.length,
    by_type: { 'json-ld': 0, microdata: 0, rdfa: 0 },
    errors: [],
    warnings: [],
    schema_types: [],
    recommendations: [],
  };
  const schemaTypes = new Set<string>();

  for (const item of items) {
    validation.by_type[item.type]++;

    if ('error' in item) {
      validation.errors.push(item.error);
      continue;
    }

    switch (item.type) {
      case 'json-ld':
        if (Array.isArray(item.data)) {
          for (const entry of item.data) {
            addJsonLdTypes(schemaTypes, entry);
          }
        } else {
          addJsonLdTypes(schemaTypes, item.data);
        }
        break;
      case 'microdata':
        // https://schema.org/Article -> Article
        if (item.itemtype.includes('/')) {
          schemaTypes.add(item.itemtype.split('/').pop() || '');
        }
        break;
      case 'rdfa':
        if (item.attributes.typeof) {
          schemaTypes.add(item.attributes.typeof);
        }
        break;
    }
  }

  validation.schema_types = Array.from(schemaTypes);

  if (validation.total_items === 0) {
    validation.recommendations.push('No structured data found. Consider adding schema markup to improve SEO.');
  }
  if (validation.by_type['json-ld'] === 0) {
    validation.recommendations.push(
      "Consider using JSON-LD format as it's Google's preferred structured data format."
    );
  }
  if (validation.errors.length > 0) {
    validation.recommendations.push(
      'Fix JSON-LD parsing errors to ensure search engines can read your structured data.'
    );
  }
  if (validation.schema_types.length > MAX_SCHEMA_TYPES) {
    validation.warnings.push('Large number of different schema types detected. Ensure they are all necessary.');
  }

  return validation;
}

export function extractStructuredData($: CheerioAPI): {
  jsonLd: Array<JsonLdItem | JsonLdError>;
  microdata: MicrodataItem[];
  rdfa: RdfaItem[];
} {
  return {
    jsonLd: extractJsonLd($),
    microdata: extractMicrodata($),
    rdfa: extractRdfa($),
  };
}
