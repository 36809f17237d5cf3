// channel id -> upstream icon url
export type ChannelIconMap = Record<string, string>;

// Returns the icon url a channel should point at, or undefined to leave it alone
export type IconResolver = (channelId: string) => string | undefined;

export interface RewriteResult {
  xml: string;
  changes: number; // icons whose src actually changed (added ones included)
}

export interface XmlFile {
  xml: string;
  gzipped: boolean;
  /** lower-cased name from the XML declaration; the text above is already decoded from it */
  encoding: string;
}
