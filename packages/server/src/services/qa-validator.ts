import { LinkMode, type ValidatedLink } from '@metadata-writer/shared';
import { MAX_PROBLEM_LINES, MAX_TAGS_LENGTH, TITLE_LABELS, TITLE_LENGTH } from '../config/prompts';

// Each rule sees the same input and reports only its own violations
export interface QaInput {
  text: string;
  lines: string[];
  linkMode: LinkMode;
  validatedLinks: ValidatedLink[];
}

export type QaRule = (input: QaInput) => string[];

const TIMESTAMP_LINE = /^(\d{2}):(\d{2})\s+.+/;

// Code points, not UTF-16 units
const charLength = (value: string) => [...value].length;

export const checkDashes: QaRule = ({ text }) =>
  text.includes('—') || text.includes('–')
    ? ['Contains an em dash or en dash (—/–).']
    : [];

export const checkTitleLabels: QaRule = ({ text }) =>
  TITLE_LABELS.filter((label) => !text.includes(label)).map((label) => `Missing title label: ${label}`);

export const checkTitleLengths: QaRule = ({ lines }) => {
  const issues: string[] = [];
  for (const label of TITLE_LABELS) {
    const labelIndex = lines.findIndex((line) => line.trim() === label);
    if (labelIndex === -1) continue;

    const title = lines.slice(labelIndex + 1).find((line) => line.trim());
    if (title === undefined) {
      issues.push(`No title text found after ${label}`);
      continue;
    }

    const length = charLength(title.trim());
    if (length < TITLE_LENGTH.min || length > TITLE_LENGTH.max) {
      issues.push(`Title length ${length} after ${label} (must be ${TITLE_LENGTH.min} to ${TITLE_LENGTH.max}).`);
    }
  }
  return issues;
};

export const checkWatchNext: QaRule = ({ lines, linkMode, validatedLinks }) => {
  const hasWatchNext = lines.some((line) => line.trim().toLowerCase().startsWith('watch next'));
  if (!hasWatchNext) return [];

  if (linkMode !== LinkMode.PROVIDED) {
    return ['Watch Next present but links were not provided.'];
  }
  if (!validatedLinks.some((link) => link.ok)) {
    return ['Watch Next present but no valid links remained.'];
  }
  return [];
};

export const checkTagsLine: QaRule = ({ lines }) => {
  const nonBlank = lines.map((line) => line.trim()).filter(Boolean);
  const last = nonBlank[nonBlank.length - 1];
  if (last === undefined) return [];

  if (!last.includes(',')) {
    return ['Tags line not detected (expected one comma-separated line at the end).'];
  }
  const length = charLength(last);
  if (length > MAX_TAGS_LENGTH) {
    return [`Tags line is ${length} chars (must be <= ${MAX_TAGS_LENGTH}).`];
  }
  return [];
};

/**
 * Collects MM:SS seconds from timestamped lines after the first "Type" line.
 */
export function extractProblemTimestamps(lines: string[]): number[] {
  const typeIndex = lines.findIndex((line) => /^type\b/i.test(line.trim()));
  if (typeIndex === -1) return [];

  const seconds: number[] = [];
  for (const line of lines.slice(typeIndex + 1)) {
    const match = TIMESTAMP_LINE.exec(line.trim());
    if (match) seconds.push(Number(match[1]) * 60 + Number(match[2]));
  }
  return seconds;
}

export const checkProblemTimestamps: QaRule = ({ lines }) => {
  const seconds = extractProblemTimestamps(lines);
  const issues: string[] = [];

  if (seconds.some((value, i) => i > 0 && seconds[i - 1] >= value)) {
    issues.push('Education Problems timestamps are not strictly increasing or contain duplicates.');
  }
  if (seconds.length > MAX_PROBLEM_LINES) {
    issues.push(`Education Problems has ${seconds.length} lines (must be up to ${MAX_PROBLEM_LINES}).`);
  }
  return issues;
};

export const QA_RULES: readonly QaRule[] = [
  checkDashes,
  checkTitleLabels,
  checkTitleLengths,
  checkWatchNext,
  checkTagsLine,
  checkProblemTimestamps
];

/**
 * Post-generation policy check. All rules run; the report keeps rule order.
 */
export function checkMetadata(
  outputText: string,
  linkMode: LinkMode,
  validatedLinks: ValidatedLink[]
): string[] {
  const input: QaInput = {
    text: outputText,
    lines: outputText.split(/\r\n|\r|\n/),
    linkMode,
    validatedLinks
  };
  return QA_RULES.flatMap((rule) => rule(input));
}
