/**
 * dialog/filters.ts
 *
 * The two fixed dialog configurations, one per content kind.
 */

import { ContentKind, SaveDialogRequest } from '../core/types';

export const TEXT_SAVE_DIALOG: SaveDialogRequest = {
  title: 'Save Text File',
  defaultName: 'clipboard_text.txt',
  filters: [
    { label: 'Text Files (*.txt)', pattern: '*.txt' }
  ]
};

export const IMAGE_SAVE_DIALOG: SaveDialogRequest = {
  title: 'Save Image File',
  defaultName: 'clipboard_image.png',
  filters: [
    { label: 'PNG Image (*.png)', pattern: '*.png' },
    { label: 'JPEG Image (*.jpg)', pattern: '*.jpg' }
  ]
};

export function saveDialogFor(kind: ContentKind): SaveDialogRequest {
  return kind === 'image' ? IMAGE_SAVE_DIALOG : TEXT_SAVE_DIALOG;
}
