import type { Response } from 'express';

// Sends plain text as a .txt file download.
export function sendTextDownload(res: Response, fileName: string, content: string): void {
  res.status(200).attachment(fileName).send(content);
}
