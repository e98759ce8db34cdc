export type ChartMediaType = 'image/png' | 'image/jpeg';

export type ChartImage = Readonly<{
  fileName: string;
  mediaType: ChartMediaType;
  /** Base64-encoded image bytes. */
  data: string;
}>;

export type SearchResult = Readonly<{
  title: string;
  snippet: string;
  source: string;
  date: string;
  link: string;
}>;

export type ScrapedPage = Readonly<{
  url: string;
  text: string;
}>;
