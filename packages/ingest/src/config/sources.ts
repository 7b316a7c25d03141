export const FEED_URL = "https://nsearchives.nseindia.com/content/RSS/Online_announcements.xml";

export const FEED_USER_AGENT = "Mozilla/5.0";

export const DOCUMENT_HEADERS = {
  "User-Agent": "Mozilla/5.0 (compatible; CorporateFilingsBot/1.0)",
  Accept: "application/pdf",
  Connection: "keep-alive",
};

// Bare "meet" and "call" are left out: they also hit "Board Meeting" and "call money".
export const ALLOWED_KEYWORDS = [
  "analyst",
  "analysts",
  "institutional",
  "investor",
  "concall",
  "conference call",
  "conferencecall",
  "earnings call",
  "analyst meet",
  "investor meet",
  "meet/concall",
];

export const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

export const CALENDAR_SCOPES = ["https://www.googleapis.com/auth/calendar"];

export const EVENT_TAG = "[AUTO:NSE_RSS_SCRIPT]";

export const EVENT_LOCATION = "Virtual";

export const DEFAULT_DATE_FORMATS = [
  "d-MMM-yyyy h:mm a",
  "d-MMMM-yyyy h:mm a",
  "d MMM yyyy h:mm a",
  "d MMMM yyyy h:mm a",
  "MMMM d, yyyy h:mm a",
  "MMM d, yyyy h:mm a",
];
