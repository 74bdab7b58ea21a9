import * as path from 'path';
import type { Locator, Page } from 'playwright';
import * as log from '../utils/logger';
import { captureFailure } from '../utils/logger';
import { SessionLostError } from '../common/errors';
import { sanitizeDirSuffix } from '../common/debug_paths';
import { PINTEREST_SELECTORS, selectorListToQuery } from './selectors';
import { isLoginRedirectUrl } from './session';
import type {
  PinBuilderDriver,
  PinField,
  SubmissionProbe,
  UploadProbe,
} from './item_poster';

export type PlaywrightPinBuilderOptions = {
  pinBuilderUrl: string;
  artifactsDir: string;
  navigationTimeoutMs: number;
};

/** 보드 행 텍스트에서 보드명(첫 줄)만 뽑는다 */
export function boardNameFromRowText(text: string): string {
  return (text.split(/\r?\n/).map((line) => line.trim()).find(Boolean) ?? '');
}

type Countable = { count(): Promise<number> };

/**
 * 후보 셀렉터를 우선순위대로 하나씩 시도해 처음 존재하는 것을 고른다.
 * 셀렉터 목록을 ", "로 합치면 문서 순서로 매칭되어 바깥 래퍼가 먼저 잡힌다.
 */
export async function firstPresent<T extends Countable>(
  selectors: readonly string[],
  resolve: (selector: string) => T,
): Promise<T | null> {
  for (const selector of selectors) {
    const candidate = resolve(selector);
    if ((await candidate.count()) > 0) return candidate;
  }
  return null;
}

/** PinBuilderDriver의 Playwright 구현. 핀 빌더 DOM만 다룬다 */
export class PlaywrightPinBuilder implements PinBuilderDriver {
  private readonly page: Page;
  private readonly options: PlaywrightPinBuilderOptions;
  private sawSavingSpinner = false;

  constructor(page: Page, options: PlaywrightPinBuilderOptions) {
    this.page = page;
    this.options = options;
  }

  async openBuilder(): Promise<void> {
    this.ensureAlive();
    this.sawSavingSpinner = false;
    await this.page.goto(this.options.pinBuilderUrl, {
      waitUntil: 'domcontentloaded',
      timeout: this.options.navigationTimeoutMs,
    });
    const url = this.page.url();
    if (isLoginRedirectUrl(url)) {
      throw new SessionLostError(`login required: pin builder redirected to ${url}`);
    }
  }

  async hasUploadTarget(): Promise<boolean> {
    this.ensureAlive();
    return (await this.query(PINTEREST_SELECTORS.uploadInput).count()) > 0;
  }

  async uploadImage(imagePath: string): Promise<void> {
    this.ensureAlive();
    await this.query(PINTEREST_SELECTORS.uploadInput).first().setInputFiles(path.resolve(imagePath));
  }

  async probeUpload(): Promise<UploadProbe> {
    this.ensureAlive();
    if (await this.anyVisible(PINTEREST_SELECTORS.uploadError)) return 'rejected';
    const bodyText = await this.page.evaluate(() => (document.body?.innerText || '').replace(/\s+/g, ' '));
    if (PINTEREST_SELECTORS.uploadErrorTextRegex.test(bodyText)) return 'rejected';
    return (await this.anyVisible(PINTEREST_SELECTORS.uploadThumbnail)) ? 'rendered' : 'pending';
  }

  async isFieldReady(field: PinField): Promise<boolean> {
    this.ensureAlive();
    const target = await this.locateFirst(PINTEREST_SELECTORS.fields[field]);
    if (!target) return false;
    return (await target.isVisible()) && (await target.isEditable());
  }

  async fillField(field: PinField, value: string): Promise<void> {
    const target = await this.requireField(field);
    await target.scrollIntoViewIfNeeded();
    await target.click();
    await target.fill(value);
  }

  async clearField(field: PinField): Promise<void> {
    await (await this.requireField(field)).fill('');
  }

  async openBoardPicker(): Promise<void> {
    this.ensureAlive();
    const dropdown = this.query(PINTEREST_SELECTORS.boardDropdownButton).first();
    await dropdown.scrollIntoViewIfNeeded();
    await dropdown.click();
  }

  async searchBoards(text: string): Promise<boolean> {
    this.ensureAlive();
    const search = await this.locateFirst(PINTEREST_SELECTORS.boardSearchField);
    if (!search) return false;
    await search.fill(text);
    return true;
  }

  async listBoards(): Promise<string[]> {
    this.ensureAlive();
    const texts = await this.query(PINTEREST_SELECTORS.boardRow).allInnerTexts();
    return texts.map(boardNameFromRowText).filter(Boolean);
  }

  async chooseBoard(displayName: string): Promise<void> {
    this.ensureAlive();
    const rows = this.query(PINTEREST_SELECTORS.boardRow);
    const count = await rows.count();
    for (let i = 0; i < count; i++) {
      const row = rows.nth(i);
      if (boardNameFromRowText(await row.innerText()) === displayName) {
        await row.click();
        return;
      }
    }
    throw new Error(`board row disappeared: ${displayName}`);
  }

  async submit(): Promise<void> {
    this.ensureAlive();
    await this.query(PINTEREST_SELECTORS.saveButton).first().click();
  }

  async probeSubmission(): Promise<SubmissionProbe> {
    this.ensureAlive();
    if (await this.anyVisible(PINTEREST_SELECTORS.saveError)) return 'rejected';
    if (await this.anyVisible(PINTEREST_SELECTORS.saveSuccess)) return 'confirmed';
    const spinnerVisible = await this.anyVisible(PINTEREST_SELECTORS.savingSpinner);
    if (spinnerVisible) {
      this.sawSavingSpinner = true;
      return 'pending';
    }
    // 저장 스피너가 한 번 보였다가 사라졌으면 저장 완료로 본다
    return this.sawSavingSpinner ? 'confirmed' : 'pending';
  }

  async captureFailure(stage: string, filename: string): Promise<void> {
    if (this.page.isClosed()) return;
    log.warn(`[pin] capturing failure artifacts stage=${stage} file=${filename}`);
    await captureFailure(this.page, `${stage}_${sanitizeDirSuffix(filename)}`, this.options.artifactsDir);
  }

  private async locateFirst(selectors: readonly string[]): Promise<Locator | null> {
    return await firstPresent(selectors, (selector) => this.page.locator(selector).first());
  }

  private async requireField(field: PinField): Promise<Locator> {
    this.ensureAlive();
    const target = await this.locateFirst(PINTEREST_SELECTORS.fields[field]);
    if (!target) throw new Error(`field not found: ${field}`);
    return target;
  }

  private query(selectors: readonly string[]): Locator {
    return this.page.locator(selectorListToQuery(selectors));
  }

  private async anyVisible(selectors: readonly string[]): Promise<boolean> {
    const locator = this.query(selectors);
    const count = await locator.count();
    for (let i = 0; i < count; i++) {
      if (await locator.nth(i).isVisible()) return true;
    }
    return false;
  }

  private ensureAlive(): void {
    if (this.page.isClosed()) {
      throw new SessionLostError('page has been closed');
    }
  }
}
