import * as path from 'path';
import type {
  PinBuilderDriver,
  PinField,
  SubmissionProbe,
  UploadProbe,
} from '../../src/pinterest/item_poster';

export type FakePinBuilderBehaviour = {
  uploadTarget?: boolean;
  /** 순서대로 반환, 마지막 값은 계속 반복 */
  uploadProbes?: UploadProbe[];
  fieldReady?: Partial<Record<PinField, boolean>>;
  boards?: string[];
  /** 검색 전 목록에 보이는 보드 수 (긴 목록이 잘리는 화면) */
  visibleBoardLimit?: number;
  /** false면 보드 검색창이 없는 화면 */
  boardSearch?: boolean;
  submissionProbes?: SubmissionProbe[];
  /** 이 파일명을 업로드하려 하면 브라우저가 닫힌 것처럼 실패 */
  closeBrowserOn?: string;
  /** 이 파일명은 첫 업로드만 거부된다 */
  rejectUploadOnceFor?: string;
  submitHangs?: boolean;
  captureFails?: boolean;
};

/** 메모리 안에서 핀 빌더 화면을 흉내내는 드라이버 */
export class FakePinBuilder implements PinBuilderDriver {
  readonly calls: string[] = [];
  readonly captures: Array<{ stage: string; filename: string }> = [];
  private readonly behaviour: FakePinBuilderBehaviour;
  private uploadProbeIndex = 0;
  private submissionProbeIndex = 0;
  private currentFile = '';
  private readonly rejectedOnce = new Set<string>();
  private boardFilter: string | null = null;

  constructor(behaviour: FakePinBuilderBehaviour = {}) {
    this.behaviour = behaviour;
  }

  async openBuilder(): Promise<void> {
    this.calls.push('openBuilder');
    this.uploadProbeIndex = 0;
    this.submissionProbeIndex = 0;
  }

  async hasUploadTarget(): Promise<boolean> {
    this.calls.push('hasUploadTarget');
    return this.behaviour.uploadTarget ?? true;
  }

  async uploadImage(imagePath: string): Promise<void> {
    const filename = path.basename(imagePath);
    this.calls.push(`uploadImage:${filename}`);
    this.currentFile = filename;
    if (this.behaviour.closeBrowserOn === filename) {
      throw new Error('locator.setInputFiles: Target page, context or browser has been closed');
    }
  }

  async probeUpload(): Promise<UploadProbe> {
    if (this.behaviour.rejectUploadOnceFor === this.currentFile && !this.rejectedOnce.has(this.currentFile)) {
      this.rejectedOnce.add(this.currentFile);
      return 'rejected';
    }
    return next(this.behaviour.uploadProbes ?? ['rendered'], this.uploadProbeIndex++);
  }

  async isFieldReady(field: PinField): Promise<boolean> {
    this.calls.push(`isFieldReady:${field}`);
    return this.behaviour.fieldReady?.[field] ?? true;
  }

  async fillField(field: PinField, value: string): Promise<void> {
    this.calls.push(`fillField:${field}=${value}`);
  }

  async clearField(field: PinField): Promise<void> {
    this.calls.push(`clearField:${field}`);
  }

  async openBoardPicker(): Promise<void> {
    this.calls.push('openBoardPicker');
    this.boardFilter = null;
  }

  async listBoards(): Promise<string[]> {
    const boards = this.behaviour.boards ?? ['Travel', 'Food'];
    const filter = this.boardFilter;
    if (filter === null) {
      return boards.slice(0, this.behaviour.visibleBoardLimit ?? boards.length);
    }
    return boards.filter((name) => name.toLowerCase().includes(filter.trim().toLowerCase()));
  }

  async searchBoards(text: string): Promise<boolean> {
    this.calls.push(`searchBoards:${text}`);
    if (this.behaviour.boardSearch === false) return false;
    this.boardFilter = text;
    return true;
  }

  async chooseBoard(displayName: string): Promise<void> {
    this.calls.push(`chooseBoard:${displayName}`);
  }

  async submit(): Promise<void> {
    this.calls.push('submit');
    if (this.behaviour.submitHangs) {
      await new Promise<void>(() => undefined);
    }
  }

  async probeSubmission(): Promise<SubmissionProbe> {
    return next(this.behaviour.submissionProbes ?? ['confirmed'], this.submissionProbeIndex++);
  }

  async captureFailure(stage: string, filename: string): Promise<void> {
    this.captures.push({ stage, filename });
    if (this.behaviour.captureFails) {
      throw new Error('screenshot failed');
    }
  }
}

function next<T>(values: readonly T[], index: number): T {
  return values[Math.min(index, values.length - 1)];
}
