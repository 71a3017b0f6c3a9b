import fs from 'fs';
import path from 'path';
import crypto from 'crypto';

/**
 * Write text to disk atomically.
 *
 * The content goes to a uniquely named temp file beside the target which is
 * then renamed over it, so a reader never observes a half-written file and a
 * failed write leaves any previous version of the target untouched. The temp
 * file is removed when either step fails and the error propagates unchanged.
 * Missing parent directories are created.
 */
export function atomicWriteText(filePath: string, text: string): void {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });
  const tmp = path.join(dir, `.${path.basename(filePath)}.${crypto.randomBytes(6).toString('hex')}.tmp`);
  try {
    fs.writeFileSync(tmp, text, 'utf8');
    fs.renameSync(tmp, filePath);
  } catch(err){
    try { if(fs.existsSync(tmp)) fs.unlinkSync(tmp); } catch { /* temp cleanup is best effort; the write error wins */ }
    throw err;
  }
}

/** Write one entry per line, each LF terminated. */
export function atomicWriteLines(filePath: string, lines: readonly string[]): void {
  atomicWriteText(filePath, lines.map(l => l + '\n').join(''));
}
