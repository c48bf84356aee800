export interface Step {
  sequence: number;
  day: number;
  title: string;
  duration: string; // free text, e.g. "45 minutes" or "Half a day"
  description: string;
  externalInfo?: string;
  infoSource?: string; // url of the search result behind externalInfo
}
