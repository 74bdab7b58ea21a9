import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

// 테스트 로그/아티팩트는 임시 디렉토리로
const root = fs.mkdtempSync(path.join(os.tmpdir(), 'pin-poster-test-'));
process.env.PINPOST_LOG_DIR = path.join(root, 'logs');
process.env.PINPOST_ARTIFACTS_DIR = path.join(root, 'artifacts');
