/** User-facing texts of the tagging conversation. */

export const REPLIES = {
  noTagsYet: "You don't have any tags yet. Click the button below to create your first tag:",
  chooseTag: 'Choose a tag or create a new one:',
  manyTags: (count: number) =>
    `You have many tags (${count}). Choose by typing its name or number, or create a new one:`,
  typeNameOrNumber: 'Type a tag name/number or create a new tag.',
  createNewTagButton: '➕ Create New Tag',
  askNewTagName: 'Please reply with the name for your new tag:',
  waitingForNewTagName: 'Please reply with your new tag name...',
  tagged: (name: string) => `✅ Message tagged with '${name}'`,
  taggedEdit: (name: string) => `✅ Tagged with '${name}'`,
  originalNotFound: 'Could not find the original message to tag.',
  emptyTagName: 'Please enter a tag name.',
  invalidTagNumber: 'Invalid tag number. Please try again.',
  tagsUnavailable: 'Could not load your tags.',
  storeFailure: 'Something went wrong while saving the tag. Please try again.',
} as const

/** Phrases that identify one of our pickers even if the marker was lost. */
export const PICKER_PHRASES = [
  REPLIES.noTagsYet,
  REPLIES.chooseTag,
  'Choose by typing its name or number',
  REPLIES.askNewTagName,
] as const
