export type EscapeMode = "plus" | "percent";

export type PlatformTemplate = {
  category: string;
  platform: string;
  urlPattern: string;
  escape: EscapeMode;
};

export type SearchRecord = {
  category: string;
  platform: string;
  url: string; // expanded URL, or "Error: <reason>" when expansion failed
  error?: string;
  generatedAt: string; // ISO
};

export type BrowserOpener = (url: string) => Promise<boolean>;

export type OpenEvent = {
  record: SearchRecord;
  status: "opened" | "failed" | "skipped";
  error?: string;
};

export type ExportFormat = "txt" | "json" | "csv";

export type SearchOutcome = {
  ok: boolean;
  message: string;
  url?: string;
};
