// Selectors for the reCAPTCHA v2 widget, in Playwright selector syntax.

export const Locators = {
  checkboxFrame: 'iframe[title="reCAPTCHA"]',
  challengeFrame: 'iframe[title*="challenge"]',
  checkbox: 'div.recaptcha-checkbox-border',
  checkedIndicator: 'span[aria-checked="true"]',
  instructions: '#rc-imageselect',
  targetTerm: '#rc-imageselect strong',
  tileImages: '#rc-imageselect-target img',
  reloadButton: '#recaptcha-reload-button',
  verifyButton: '#recaptcha-verify-button',
} as const;

/** Grid cell by 1-based row-major index. */
export const tileCell = (index: number): string => `xpath=(//div[@id="rc-imageselect-target"]//td)[${index}]`;
