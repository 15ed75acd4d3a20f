export interface Editor {
  /** Let the user edit `initialContent` and resolve with what they saved. */
  editText(initialContent?: string): Promise<string>;
}
