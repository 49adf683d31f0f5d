import { html } from 'hono/html';
import type { ThreadRecord } from '../monitoring/types.js';

export interface RenderedDigest {
  subject: string;
  text: string;
  html: string;
}

const REDDIT_ORIGIN = 'https://www.reddit.com';

export function threadLink(record: ThreadRecord): string {
  const { permalink, url } = record.post;
  if (permalink) return permalink.startsWith('http') ? permalink : `${REDDIT_ORIGIN}${permalink}`;
  return url;
}

export function digestSubject(count: number, generatedAt: Date): string {
  const day = generatedAt.toISOString().slice(0, 10);
  return `Thread digest ${day}: ${count} drafted ${count === 1 ? 'response' : 'responses'}`;
}

export function renderDigestText(records: readonly ThreadRecord[]): string {
  return records
    .map((record, i) => {
      const { assessment } = record;
      const lines = [
        `${i + 1}. [${record.tier.toUpperCase()}] r/${record.source}: ${record.post.title}`,
        `   ${threadLink(record)}`,
        `   Score ${assessment.totalScore.toFixed(1)} | ${assessment.userType} | urgency ${assessment.urgencyLevel}`,
      ];
      if (assessment.painPoints.length > 0) {
        lines.push(`   Pain points: ${assessment.painPoints.join('; ')}`);
      }
      lines.push('', record.draftedResponse ?? '', '');
      return lines.join('\n');
    })
    .join('\n');
}

async function renderDigestHtml(records: readonly ThreadRecord[], generatedAt: Date): Promise<string> {
  const items = records.map(
    (record) => html`
      <li style="margin-bottom:24px">
        <p>
          <strong>[${record.tier.toUpperCase()}]</strong>
          r/${record.source}:
          <a href="${threadLink(record)}">${record.post.title}</a>
        </p>
        <p style="color:#555">
          Score ${record.assessment.totalScore.toFixed(1)} &middot; ${record.assessment.userType}
          &middot; urgency ${record.assessment.urgencyLevel}
        </p>
        <blockquote style="white-space:pre-wrap;border-left:3px solid #ccc;padding-left:12px">${record.draftedResponse ?? ''}</blockquote>
      </li>`,
  );

  const page = await html`<!doctype html>
<html>
  <body style="font-family:sans-serif">
    <h1>${digestSubject(records.length, generatedAt)}</h1>
    <ol>${items}</ol>
  </body>
</html>`;
  return page.toString();
}

export async function renderDigest(records: readonly ThreadRecord[], generatedAt: Date): Promise<RenderedDigest> {
  return {
    subject: digestSubject(records.length, generatedAt),
    text: renderDigestText(records),
    html: await renderDigestHtml(records, generatedAt),
  };
}
