/**
 * Schema Audit Types
 * Structured data items as found on the page
 */

export type StructuredDataFormat = 'json-ld' | 'microdata' | 'rdfa';

export interface JsonLdItem {
  type: 'json-ld';
  data: unknown;
  raw: string;
}

export interface JsonLdError {
  type: 'json-ld';
  error: string;
  raw: string;
}

export type MicrodataValue = string | string[];

export interface MicrodataItem {
  type: 'microdata';
  itemtype: string;
  properties: Record<string, MicrodataValue>;
}

export interface RdfaItem {
  type: 'rdfa';
  attributes: Record<string, string>;
  content: string;
}

export type StructuredDataItem = JsonLdItem | JsonLdError | MicrodataItem | RdfaItem;

export interface SchemaValidation {
  total_items: number;
  by_type: Record<StructuredDataFormat, number>;
  errors: string[];
  warnings: string[];
  schema_types: string[];
  recommendations: string[];
}

export interface SchemaAuditReport {
  validation: SchemaValidation;
  structured_data: {
    json_ld: Array<JsonLdItem | JsonLdError>;
    microdata: MicrodataItem[];
    rdfa: RdfaItem[];
  };
  audit_info: {
    url: string;
    audit_time: number;
    page_title: string;
    timestamp: string;
    total_structured_items: number;
  };
}
