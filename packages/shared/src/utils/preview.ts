import { NOTE_PREVIEW_LENGTH } from '../constants/limits.js';

/**
 * Truncate note content for list views, marking the cut with an ellipsis
 */
export function buildContentPreview(content: string, length: number = NOTE_PREVIEW_LENGTH): string {
  if (content.length <= length) return content;
  return `${content.slice(0, length)}...`;
}
