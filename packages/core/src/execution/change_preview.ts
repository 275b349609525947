import { createTwoFilesPatch, structuredPatch } from 'diff';

export interface ChangePreview {
  /** Unified diff of the file, `a/` and `b/` prefixed */
  patch: string;
  added: number;
  removed: number;
}

export function previewChange(filePath: string, before: string, after: string): ChangePreview {
  const patch = createTwoFilesPatch(`a/${filePath}`, `b/${filePath}`, before, after);
  let added = 0;
  let removed = 0;
  for (const hunk of structuredPatch(filePath, filePath, before, after).hunks) {
    for (const line of hunk.lines) {
      if (line.startsWith('+')) added++;
      else if (line.startsWith('-')) removed++;
    }
  }
  return { patch, added, removed };
}

export function summarizeChange({ added, removed }: ChangePreview): string {
  return `${added + removed} lines changed (+${added} -${removed})`;
}

export interface PullRequestBodyInput {
  instruction: string;
  filePath: string;
  rolloutPct: number;
  preview: ChangePreview;
  /** Diff lines shown before the preview is cut */
  maxLines: number;
}

export function buildPullRequestBody(input: PullRequestBodyInput): string {
  const lines = input.preview.patch
    .replace(/\n$/, '')
    .split('\n')
    .filter((line) => !/^=+$/.test(line));
  const shown = lines.slice(0, input.maxLines);
  const hidden = lines.length - shown.length;

  const body = [
    '## Northstar Experiment',
    '',
    `**Instruction:** ${input.instruction}`,
    `**File:** \`${input.filePath}\``,
    `**Rollout:** ${input.rolloutPct}%`,
    `**Changes:** ${summarizeChange(input.preview)}`,
    '',
    '### Diff',
    '',
    '```diff',
    ...shown,
    '```',
  ];
  if (hidden > 0) {
    body.push('', `_${hidden} more diff lines not shown._`);
  }
  return body.join('\n');
}
