import { TitleSlots } from '../models/Recommendation';

// "<rank>. [Название фильма:] <title>" – the title stops at the first colon,
// period or line break.
const RANKED_LINE = /^[ \t]*(\d+)\.[ \t]*(?:Название фильма:[ \t]*)?([^:.\n]+)/gm;

/**
 * Best-effort extraction of the top-3 titles from free-form model output.
 * Lines that do not look like a ranked entry are skipped; when a rank occurs
 * more than once the last occurrence wins.
 */
export function extractTitles(responseText: string): TitleSlots {
  const slots: TitleSlots = [null, null, null];

  for (const match of responseText.matchAll(RANKED_LINE)) {
    const rank = Number(match[1]);
    if (rank < 1 || rank > 3) continue;

    const title = match[2].replace(/[,.]\s*$/, '').trim();
    slots[rank - 1] = title.length > 0 ? title : null;
  }

  return slots;
}
