import * as fs from 'fs';
import * as path from 'path';
import * as https from 'https';
import * as http from 'http';
import type { LanguageModel } from './llm/languageModel';

export type MediaKind = 'voice' | 'photo';

const mediaFormats: Record<MediaKind, { extension: string; mimeType: string }> = {
  voice: { extension: 'ogg', mimeType: 'audio/ogg' },
  photo: { extension: 'jpg', mimeType: 'image/jpeg' },
};

const voicePrompt =
  'Transcribe this voice note verbatim. Reply with the transcript only, without quotes or commentary.';

function buildPhotoPrompt(caption: string | null): string {
  return (
    'The user sent this image to their task manager. Describe the task or to-do it shows ' +
    'in one or two sentences, written as if the user typed the task themselves. ' +
    (caption ? `The image caption is: "${caption}". ` : '') +
    'Reply with the task description only.'
  );
}

/** `<tempDir>/<timestamp>_<fileId>.<ext>` */
export function getTempPath(tempDir: string, fileId: string, kind: MediaKind, now = Date.now()): string {
  return path.join(tempDir, `${now}_${fileId}.${mediaFormats[kind].extension}`);
}

export async function downloadFile(url: string, destPath: string): Promise<void> {
  fs.mkdirSync(path.dirname(destPath), { recursive: true });

  return new Promise((resolve, reject) => {
    const file = fs.createWriteStream(destPath);
    const client = url.startsWith('https') ? https : http;

    client.get(url, (response) => {
      if (response.statusCode === 301 || response.statusCode === 302) {
        const redirectUrl = response.headers.location;
        if (redirectUrl) {
          file.close();
          fs.unlinkSync(destPath);
          downloadFile(redirectUrl, destPath).then(resolve).catch(reject);
          return;
        }
      }
      if (response.statusCode !== undefined && response.statusCode >= 400) {
        file.close();
        fs.unlinkSync(destPath);
        reject(new Error(`Download failed with HTTP ${response.statusCode}`));
        return;
      }
      response.pipe(file);
      file.on('finish', () => {
        file.close();
        resolve();
      });
    }).on('error', (err) => {
      fs.unlink(destPath, (unlinkErr) => {
        if (unlinkErr) console.error('[Bot] Failed to remove partial download:', unlinkErr.message);
      });
      reject(err);
    });
  });
}

/**
 * @description Turns a downloaded voice note or photo into task text with the
 * multimodal model. Returns null when the model gives back nothing usable.
 */
export class MediaTranscriber {
  constructor(private readonly model: LanguageModel) {}

  async extractText(kind: MediaKind, filePath: string, caption: string | null = null): Promise<string | null> {
    const data = fs.readFileSync(filePath);
    const prompt = kind === 'voice' ? voicePrompt : buildPhotoPrompt(caption);
    console.log(`[Bot] Sending ${kind} (${data.length} bytes) to ${this.model.name}...`);

    const reply = (await this.model.generate(prompt, [{ mimeType: mediaFormats[kind].mimeType, data }])).trim();
    return reply ? reply : null;
  }
}
