export type WikiPage = {
  title: string;
  extractHtml: string;
  disambiguation: boolean;
};

export type Summary = {
  topic: string;
  title: string;
  sentences: string[];
  text: string;
  url: string;
};
