/**
 * Accessibility Audit Types
 */

export type Impact = 'critical' | 'serious' | 'moderate' | 'minor';

/**
 * One violation, pass or warning. Which optional fields are set
 * depends on the finding type.
 */
export interface Finding {
  type: string;
  description: string;
  element?: string;
  src?: string;
  alt?: string;
  element_id?: string;
  label_method?: string;
  impact?: Impact;
}

export interface AltTextAudit {
  total_images: number;
  images_with_alt: number;
  images_without_alt: number;
  images_with_empty_alt: number;
  decorative_images: number;
  violations: Finding[];
  passes: Finding[];
}

export interface ContrastViolation {
  id: 'color-contrast';
  impact: 'serious';
  description: string;
  element: string;
  /** Ratio formatted with two decimals */
  contrast: string;
  text: string;
}

export interface ContrastPass {
  id: 'color-contrast';
  element: string;
  contrast: string;
}

export interface ContrastAudit {
  total_elements_checked: number;
  contrast_violations: number;
  contrast_passes: number;
  violations: ContrastViolation[];
  passes: ContrastPass[];
  error: string | null;
}

export interface AriaAudit {
  total_interactive_elements: number;
  elements_with_labels: number;
  elements_without_labels: number;
  violations: Finding[];
  passes: Finding[];
  warnings: Finding[];
}

export interface AccessibilitySummary {
  accessibility_score: number;
  total_violations: number;
  total_passes: number;
  violations_by_severity: Record<Impact, number>;
  recommendations: string[];
}

export interface AccessibilityReport {
  accessibility_summary: AccessibilitySummary;
  alt_text_audit: AltTextAudit;
  contrast_audit: ContrastAudit;
  aria_audit: AriaAudit;
  audit_info: {
    url: string;
    audit_time: number;
    page_title: string;
    timestamp: string;
    wcag_level: 'AA';
    checks_performed: string[];
  };
}
