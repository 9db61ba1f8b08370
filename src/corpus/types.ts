/** One paper's raw text as cut from the corpus, with its 1-based position. */
export interface PaperRecord {
  index: number;
  text: string;
}
