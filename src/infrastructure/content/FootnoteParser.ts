import type { Footnote } from '../../domain/entities/Document.js';

export interface FootnoteScan {
  /** 依首次引用順序排列，未被引用的定義依定義順序接在後面 */
  footnotes: Footnote[];
  /** 被定義超過一次的 marker */
  duplicateMarkers: string[];
  /** 內文引用但沒有定義的 marker */
  undefinedReferences: string[];
}

const FENCE_RE = /^\s*(`{3,}|~{3,})/;
const DEFINITION_RE = /^ {0,3}\[\^([^\]\s]+)\]:[ \t]*(.*)$/;
const CONTINUATION_RE = /^(?: {4}|\t)(.*)$/;
const REFERENCE_RE = /\[\^([^\]\s]+)\](?!:)/g;
const CODE_SPAN_RE = /`[^`]*`/g;

/** 解析 Markdown 內文的 `[^marker]` 引用與 `[^marker]: text` 定義 */
export class FootnoteParser {
  parse(body: string): FootnoteScan {
    const lines = body.split(/\r?\n/);
    const definitions = new Map<string, string>();
    const duplicates = new Set<string>();
    const referenced: string[] = [];
    const seenRefs = new Set<string>();

    let fence: string | null = null;

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];

      const fenceMatch = FENCE_RE.exec(line);
      if (fenceMatch) {
        const marker = fenceMatch[1];
        if (fence === null) {
          fence = marker[0];
        } else if (marker[0] === fence) {
          fence = null;
        }
        continue;
      }
      if (fence !== null) continue;

      const def = DEFINITION_RE.exec(line);
      if (def) {
        const [, marker, first] = def;
        const parts = [first.trimEnd()];

        // 縮排行（中間可夾空行）延續同一個定義
        while (i + 1 < lines.length) {
          const next = lines[i + 1];
          const cont = CONTINUATION_RE.exec(next);
          if (cont) {
            parts.push(cont[1].trimEnd());
            i++;
            continue;
          }
          if (!next.trim() && i + 2 < lines.length && CONTINUATION_RE.test(lines[i + 2])) {
            parts.push('');
            i++;
            continue;
          }
          break;
        }

        if (definitions.has(marker)) {
          duplicates.add(marker);
        } else {
          definitions.set(marker, parts.join('\n').trim());
        }
        continue;
      }

      for (const ref of line.replace(CODE_SPAN_RE, '').matchAll(REFERENCE_RE)) {
        const marker = ref[1];
        if (!seenRefs.has(marker)) {
          seenRefs.add(marker);
          referenced.push(marker);
        }
      }
    }

    const footnotes: Footnote[] = [];
    const undefinedReferences: string[] = [];
    for (const marker of referenced) {
      const text = definitions.get(marker);
      if (text === undefined) {
        undefinedReferences.push(marker);
      } else {
        footnotes.push({ marker, text });
      }
    }
    for (const [marker, text] of definitions) {
      if (!seenRefs.has(marker)) footnotes.push({ marker, text });
    }

    return { footnotes, duplicateMarkers: [...duplicates], undefinedReferences };
  }
}
