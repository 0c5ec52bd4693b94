/**
 * SEO Audit Types
 */

import type { WireFailure } from '../../../lib/tools/tool-result';

export interface PageInfo {
  url: string;
  status_code: number | null;
  title: string;
  title_length: number;
  meta_description: string;
  meta_description_length: number;
  h1_count: number;
  h2_count: number;
  image_count: number;
  link_count: number;
  load_time_ms: number | null;
}

export const META_TAG_NAMES = [
  'title',
  'meta_description',
  'meta_keywords',
  'og_title',
  'og_description',
  'og_image',
  'twitter_card',
  'canonical',
  'viewport',
  'charset',
  'robots',
] as const;

export type MetaTagName = (typeof META_TAG_NAMES)[number];

/**
 * Selector per checked tag; presence of any match counts
 */
export const META_TAG_SELECTORS: Record<MetaTagName, string> = {
  title: 'title',
  meta_description: 'meta[name="description"]',
  meta_keywords: 'meta[name="keywords"]',
  og_title: 'meta[property="og:title"]',
  og_description: 'meta[property="og:description"]',
  og_image: 'meta[property="og:image"]',
  twitter_card: 'meta[name="twitter:card"]',
  canonical: 'link[rel="canonical"]',
  viewport: 'meta[name="viewport"]',
  charset: 'meta[charset]',
  robots: 'meta[name="robots"]',
};

export interface MetaTagsReport {
  url: string;
  meta_tags: Record<MetaTagName, boolean>;
  completeness_score: number;
  missing_tags: MetaTagName[];
}

export interface ImageAltReport {
  url: string;
  total_images: number;
  images_without_alt: number;
  accessibility_score: number;
  missing_alt_images: string[];
}

/**
 * Milliseconds from the Navigation and Paint Timing APIs
 */
export interface TimingMetrics {
  dns_lookup: number;
  tcp_connect: number;
  request_time: number;
  response_time: number;
  dom_loading: number;
  total_load_time: number;
  first_paint: number | null;
  first_contentful_paint: number | null;
}

export interface ResourceCounts {
  scripts: number;
  stylesheets: number;
  images: number;
  fonts: number;
  other: number;
  total_requests: number;
}

export interface PagePerformanceReport {
  url: string;
  timing_metrics: TimingMetrics | null;
  resource_counts: ResourceCounts;
  status_code: number | null;
}

export interface QuickSeoAuditReport {
  url: string;
  overall_seo_score: number;
  page_info: PageInfo | WireFailure;
  meta_tags: MetaTagsReport | WireFailure;
  images_audit: ImageAltReport | WireFailure;
  performance: PagePerformanceReport | WireFailure;
  recommendations: string[];
}
