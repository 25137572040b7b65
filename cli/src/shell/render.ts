/**
 * Plain-text rendering of command results for the shell.
 *
 * Lines carry a tone; the shell maps tones to colours so the text itself
 * stays free of escape codes.
 */
import { BYTES, QuotaTracker, errorLabel, type CommandResult, type Entry, type PreviewResult } from '@minidrive/shared';

export type Tone = 'normal' | 'muted' | 'success' | 'warning' | 'error' | 'folder';

export interface RenderedLine {
  text: string;
  tone: Tone;
}

const line = (text: string, tone: Tone = 'normal'): RenderedLine => ({ text, tone });

/**
 * Size column of a listing: `-` for folders, whole kilobytes for files.
 */
export function formatEntrySize(entry: Entry): string {
  if (entry.kind === 'folder') return '-';
  return `${Math.floor(entry.sizeBytes / BYTES.KB)} KB`;
}

export function renderEntries(entries: readonly Entry[]): RenderedLine[] {
  if (entries.length === 0) return [line('(empty)', 'muted')];

  const nameWidth = Math.max(4, ...entries.map((entry) => entry.name.length));
  const header = line(`${'Name'.padEnd(nameWidth)}  ${'Type'.padEnd(6)}  Size`, 'muted');

  return [
    header,
    ...entries.map((entry) =>
      line(
        `${entry.name.padEnd(nameWidth)}  ${(entry.kind === 'folder' ? 'Folder' : 'File').padEnd(6)}  ${formatEntrySize(entry)}`,
        entry.kind === 'folder' ? 'folder' : 'normal'
      )
    ),
  ];
}

export function renderPreview(preview: PreviewResult): RenderedLine[] {
  switch (preview.kind) {
    case 'text': {
      const lines = [line(`--- ${preview.name} ---`, 'muted'), ...preview.content.split('\n').map((text) => line(text))];
      if (preview.truncated) {
        lines.push(line(`--- showing ${preview.bytesRead} of ${preview.totalBytes} bytes ---`, 'muted'));
      }
      return lines;
    }
    case 'image':
      return [
        line(`${preview.name}: ${preview.format} image, ${preview.width}x${preview.height}`),
        line(`Displayed at ${preview.targetWidth}x${preview.targetHeight}`, 'muted'),
      ];
    case 'external':
      return [line(`Opened ${preview.name} with the default application`, 'success')];
  }
}

export function renderResult(result: CommandResult): RenderedLine[] {
  if (!result.ok) {
    return [line(`${errorLabel(result.error.type)}: ${result.error.message}`, 'error')];
  }

  switch (result.type) {
    case 'list':
      return renderEntries(result.entries);
    case 'filter':
      return result.entries.length === 0
        ? [line(`No entries matching '${result.query}'`, 'muted')]
        : renderEntries(result.entries);
    case 'enter':
      return [line(result.path)];
    case 'up':
      return result.moved ? [line(result.path)] : [line('Already at the top folder', 'muted')];
    case 'pwd':
      return [line(result.path)];
    case 'mkdir':
      return [line(`Created folder ${result.entry.name}`, 'success')];
    case 'upload':
      return [line(`Uploaded ${result.entry.name} (${QuotaTracker.formatBytes(result.entry.sizeBytes)})`, 'success')];
    case 'download':
      return [line(`Downloaded ${result.entry.name} to ${result.destinationPath}`, 'success')];
    case 'delete':
      return [line(`Deleted ${result.name} (${result.report.removed.length} entries removed)`, 'success')];
    case 'open':
      return renderPreview(result.preview);
    case 'usage': {
      const { usage } = result;
      const tone: Tone = usage.percentUsed >= 90 ? 'warning' : 'normal';
      return [line(`${usage.label} (${usage.percentUsed}%)`, tone)];
    }
  }
}
