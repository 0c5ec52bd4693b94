/**
 * Identifier and text parsing for channel and video inputs
 */

import { DescriptionAnalysis, TitleAnalysis } from './youtube.types';

const CHANNEL_URL_PATTERNS = [
  /youtube\.com\/channel\/([^/?]+)/,
  /youtube\.com\/c\/([^/?]+)/,
  /youtube\.com\/user\/([^/?]+)/,
  /youtube\.com\/@([^/?]+)/,
];

const VIDEO_URL_PATTERNS = [/youtube\.com\/watch\?v=([^&]+)/, /youtu\.be\/([^?]+)/, /youtube\.com\/embed\/([^?]+)/];

const ISO_DURATION = /^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/;

/**
 * Channel id, custom name, legacy username or handle; unknown input passes through
 */
export function extractChannelId(input: string): string {
  if (input.startsWith('UC') && input.length === 24) {
    return input;
  }
  for (const pattern of CHANNEL_URL_PATTERNS) {
    const match = pattern.exec(input);
    if (match) {
      return match[1];
    }
  }
  return input;
}

export function extractVideoId(input: string): string {
  if (input.length === 11 && !input.includes('/')) {
    return input;
  }
  for (const pattern of VIDEO_URL_PATTERNS) {
    const match = pattern.exec(input);
    if (match) {
      return match[1];
    }
  }
  return input;
}

export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

/**
 * API counts are decimal strings; absent means zero
 */
export function parseCount(value: string | undefined): number {
  if (!value) {
    return 0;
  }
  const count = parseInt(value, 10);
  return Number.isNaN(count) ? 0 : count;
}

export interface ParsedDuration {
  seconds: number;
  formatted: string;
}

/**
 * ISO-8601 duration such as PT1H2M3S; days fold into hours.
 * Unparseable values read as zero.
 */
export function parseDuration(duration: string): ParsedDuration {
  const match = ISO_DURATION.exec(duration);
  if (!match) {
    return { seconds: 0, formatted: '00:00' };
  }

  const [days, hours, minutes, seconds] = match.slice(1).map((group) => parseInt(group ?? '0', 10));
  const totalHours = days * 24 + hours;
  const pad = (n: number) => String(n).padStart(2, '0');

  return {
    seconds: totalHours * 3600 + minutes * 60 + seconds,
    formatted: totalHours > 0 ? `${pad(totalHours)}:${pad(minutes)}:${pad(seconds)}` : `${pad(minutes)}:${pad(seconds)}`,
  };
}

export function analyzeTitle(title: string): TitleAnalysis {
  return {
    length: title.length,
    optimal_length: title.length >= 60 && title.length <= 70,
    has_keywords: /\b(how to|tutorial|review|vs|best)\b/.test(title.toLowerCase()),
    has_numbers: /\d+/.test(title),
    has_caps: /\p{Lu}/u.test(title),
  };
}

export function analyzeDescription(description: string): DescriptionAnalysis {
  return {
    length: description.length,
    optimal_length: description.length >= 200,
    has_links: /https?:\/\//.test(description),
    has_timestamps: /\d{1,2}:\d{2}/.test(description),
    has_hashtags: /#\w+/.test(description),
  };
}
