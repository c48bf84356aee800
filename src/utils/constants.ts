export const PLANNER_CONSTANTS = {
  MAX_SNIPPET_LENGTH: 200,
  NO_INFO_PLACEHOLDER: "No additional information found",
  DEFAULT_SEARCH_KEYWORD: "tips",
  UNSPECIFIED_DURATION: "Unspecified",
  ONGOING_DURATION: "Ongoing",
  DAILY_ROUTINE_LABEL: "Daily Routine",
  FALLBACK_STEP: {
    title: "Review your goal and break it into smaller tasks",
    duration: "30 minutes",
  },
  PLACEHOLDER_STEP: {
    title: "Define your first action",
    duration: "15 minutes",
    description: "Write down one concrete action you can take today.",
  },
  DEFAULT_FORECAST_DAYS: 3,
  MAX_FORECAST_DAYS: 5,
  FORECAST_SLOTS_PER_DAY: 8,
  DEFAULT_LIST_LIMIT: 50,
  MAX_LIST_LIMIT: 200,
} as const;

// Matched as whole words, case-insensitively, before any capitalised phrase.
export const KNOWN_LOCATIONS = [
  "jaipur",
  "hyderabad",
  "vizag",
  "visakhapatnam",
  "mumbai",
  "delhi",
  "new delhi",
  "bangalore",
  "bengaluru",
  "chennai",
  "kolkata",
  "pune",
  "goa",
  "udaipur",
  "kerala",
  "rajasthan",
  "agra",
  "varanasi",
  "london",
  "paris",
  "tokyo",
  "new york",
  "san francisco",
  "singapore",
] as const;
