/**
 * Browser Capability
 */

export * from './browser.types';
export * from './browser.utils';
export { PlaywrightBrowserProvider, browserProvider } from './playwright.browser';
