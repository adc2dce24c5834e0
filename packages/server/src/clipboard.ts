import type { ClipboardSelection, OperationRequest } from '@filework/shared';

export function toPasteRequest(
  selection: ClipboardSelection,
  destinationDir: string
): OperationRequest {
  return {
    kind: selection.mode === 'cut' ? 'move' : 'copy',
    sourcePaths: [...selection.paths],
    destinationDir,
  };
}
