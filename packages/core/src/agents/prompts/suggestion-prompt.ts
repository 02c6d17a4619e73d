/**
 * Prompt for the folder suggestion request.
 *
 * One prompt per file. The model sees the user's instructions, the optional
 * knowledge base, the file's name and metadata, and (when folders may not be
 * invented) the current folder tree.
 */

export const RESPOND_WITH_PATH_ONLY = 'Respond only with a folder path.';
export const PRESERVE_STRUCTURE_CONSTRAINT = 'Do not suggest new folders. Only pick from existing ones.';
export const ALLOW_NEW_FOLDERS_CONSTRAINT = 'You may suggest new folders if appropriate.';

export interface SuggestionPromptInput {
  instructions: string;
  knowledgeBase: string;
  filename: string;
  metadata: string;
  /** Omitted when the folder tree is not part of the context */
  folderSnapshot?: string;
  preserveStructure: boolean;
}

export function buildSuggestionPrompt(input: SuggestionPromptInput): string {
  const sections: string[] = [input.instructions.trim()];

  const knowledge = input.knowledgeBase.trim();
  if (knowledge) {
    sections.push(`Knowledge base:\n${knowledge}`);
  }

  const fileLines = [`Filename: ${input.filename}`, `Metadata: ${input.metadata}`];
  if (input.folderSnapshot !== undefined) {
    const folders = input.folderSnapshot.trimEnd();
    fileLines.push(`Existing folder structure:\n${folders || '(none)'}`);
  }
  sections.push(fileLines.join('\n'));

  sections.push(
    [
      'Constraints:',
      `- ${RESPOND_WITH_PATH_ONLY}`,
      `- ${input.preserveStructure ? PRESERVE_STRUCTURE_CONSTRAINT : ALLOW_NEW_FOLDERS_CONSTRAINT}`,
    ].join('\n')
  );

  return sections.join('\n\n');
}
