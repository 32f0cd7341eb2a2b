export type CleanerInput = {
  documentId: string;
  rawText: string;
};

export interface Cleaner {
  clean(input: CleanerInput): string;
}
