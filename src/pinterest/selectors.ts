export const PINTEREST_SELECTORS = {
  uploadInput: ["input[type='file']"],
  uploadThumbnail: [
    "[data-test-id='pin-draft-image'] img",
    "[data-test-id='media-upload-preview'] img",
    "[data-test-id='pin-builder-draft'] img[src^='blob:']",
  ],
  uploadError: [
    "[data-test-id='upload-error']",
    "[data-test-id='media-upload-error']",
  ],
  uploadErrorTextRegex: /(unsupported|couldn.t upload|upload failed|file is too (big|large))/i,
  fields: {
    title: ["textarea[id*='pin-draft-title']", "input[id*='pin-draft-title']"],
    description: ["div[id*='pin-draft-description'] [contenteditable='true']", "div[id*='pin-draft-description']"],
    link: ["textarea[id*='pin-draft-link']", "input[id*='pin-draft-link']"],
  },
  boardDropdownButton: ["button[data-test-id='board-dropdown-select-button']"],
  boardSearchField: ['#pickerSearchField', "input[data-test-id='board-picker-search']"],
  boardRow: ["div[data-test-id='boardWithoutSection']", "div[data-test-id='board-row']"],
  saveButton: ["button[data-test-id='board-dropdown-save-button']"],
  savingSpinner: ["svg[aria-label='Saving Pin...']", "[data-test-id='pin-builder-saving']"],
  saveSuccess: [
    "[data-test-id='seeItNow']",
    "[data-test-id='toast-pin-saved']",
    "a[href*='/pin/'][data-test-id='pin-saved-link']",
  ],
  saveError: ["[data-test-id='toast-error']", "[data-test-id='pin-builder-error']"],
  loggedIn: [
    "[data-test-id='header-profile']",
    "[data-test-id='header-avatar']",
    "[data-test-id='homefeed-feed']",
    "a[href*='/pin-builder/']",
  ],
  loginForm: ['input#email', 'input#password', "button[type='submit'][data-test-id='registerFormSubmitButton']"],
} as const;

export function selectorListToQuery(selectors: readonly string[]): string {
  return selectors.join(', ');
}
