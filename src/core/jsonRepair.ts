import { isValidJson, stripCodeFences } from '../utils/validators.js';

/**
 * Truncated JSON repair
 *
 * A response cut off at the output token limit usually ends inside an
 * array element. Scanning brace depth outside string literals finds the
 * last element that closed completely; everything after it is dropped and
 * the containers still open at that point are closed again.
 */

export interface JsonRepairResult {
  text: string;

  /**
   * False when the input already parsed or could not be repaired
   */
  repaired: boolean;

  keptChars: number;
  totalChars: number;
}

type Container = '{' | '[';

interface CutPoint {
  end: number;
  open: Container[];
}

/**
 * Positions just after a complete element of a top-level array (or of an
 * array held directly by a top-level object), with the containers still
 * open there
 */
function findCutPoints(text: string): CutPoint[] {
  const cutPoints: CutPoint[] = [];
  const stack: Container[] = [];
  let inString = false;
  let escapeNext = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (escapeNext) {
      escapeNext = false;
      continue;
    }
    if (ch === '\\') {
      escapeNext = true;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      continue;
    }
    if (inString) {
      continue;
    }

    if (ch === '{' || ch === '[') {
      stack.push(ch);
    } else if (ch === '}' || ch === ']') {
      stack.pop();
      if (ch === '}') {
        const elementOfOuterArray = stack.length <= 2 && stack[stack.length - 1] === '[';
        if (stack.length === 0 || elementOfOuterArray) {
          cutPoints.push({ end: i + 1, open: [...stack] });
        }
      }
    }
  }

  return cutPoints;
}

function closeContainers(prefix: string, open: Container[]): string {
  let result = prefix.trimEnd().replace(/,$/, '');
  for (let i = open.length - 1; i >= 0; i--) {
    result += open[i] === '[' ? '\n]' : '\n}';
  }
  return result;
}

export function repairTruncatedJson(text: string): JsonRepairResult {
  if (isValidJson(text)) {
    return { text, repaired: false, keptChars: text.length, totalChars: text.length };
  }

  const cleaned = stripCodeFences(text);
  const totalChars = cleaned.length;

  if (isValidJson(cleaned)) {
    return { text: cleaned, repaired: false, keptChars: totalChars, totalChars };
  }

  const cutPoints = findCutPoints(cleaned);
  for (let i = cutPoints.length - 1; i >= 0; i--) {
    const { end, open } = cutPoints[i];
    const candidate = closeContainers(cleaned.slice(0, end), open);
    if (isValidJson(candidate)) {
      return { text: candidate, repaired: true, keptChars: end, totalChars };
    }
  }

  return { text, repaired: false, keptChars: 0, totalChars };
}
