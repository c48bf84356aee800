export interface Goal {
  text: string;
  location?: string;
  dayCount?: number;
  isRecurring: boolean;
  hasLocation: boolean;
  hasDuration: boolean;
}
