import { createInterface, type Interface } from 'readline';
import type { DefaultMetadata } from '../pinterest/types';

export type Ask = (question: string) => Promise<string>;

export type Prompter = {
  ask: Ask;
  close: () => void;
};

function interruptProcess(): void {
  process.kill(process.pid, 'SIGINT');
}

/** TTY에서 질문 대기 중의 Ctrl+C는 readline이 먼저 받는다. 프로세스 SIGINT로 넘긴다 */
export function forwardInterrupt(rl: Interface, onInterrupt: () => void = interruptProcess): void {
  rl.on('SIGINT', onInterrupt);
}

export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  const rl = createInterface({ input, output });
  forwardInterrupt(rl);
  return {
    ask: (question: string) => new Promise<string>((resolve) => {
      rl.question(question, (answer) => resolve(answer));
    }),
    close: () => rl.close(),
  };
}

/**
 * askMetadata면 기본 title/description/link를 한 번 묻고,
 * 보드가 설정되지 않았으면 CSV 여부와 상관없이 보드명을 묻는다. 빈 입력은 빈 값 그대로 둔다.
 */
export async function collectDefaultMetadata(
  ask: Ask,
  opts: { askMetadata: boolean; boardName: string },
): Promise<DefaultMetadata> {
  let title = '';
  let description = '';
  let link = '';
  if (opts.askMetadata) {
    title = (await ask('  Title: ')).trim();
    description = (await ask('  Description: ')).trim();
    link = (await ask('  Link: ')).trim();
  }
  let boardName = opts.boardName.trim();
  if (!boardName) {
    boardName = (await ask('  Board name: ')).trim();
  }
  return Object.freeze({ title, description, link, boardName });
}

export async function confirmYes(ask: Ask, question: string): Promise<boolean> {
  const answer = (await ask(question)).trim().toLowerCase();
  return answer === 'y' || answer === 'yes';
}
