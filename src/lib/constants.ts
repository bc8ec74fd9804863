export interface PassInterval {
  passNo: number;
  start: string;
  end: string;
}

// Daily intervals as the portal numbers them
export const DEFAULT_PASS_SCHEDULE: readonly PassInterval[] = [
  { passNo: 0, start: "07:00", end: "10:00" },
  { passNo: 1, start: "10:00", end: "12:00" },
  { passNo: 2, start: "12:00", end: "14:00" },
  { passNo: 3, start: "14:00", end: "16:00" },
  { passNo: 4, start: "16:00", end: "18:00" },
  { passNo: 5, start: "18:00", end: "20:00" },
  { passNo: 6, start: "20:00", end: "21:00" },
  { passNo: 7, start: "21:00", end: "22:00" },
] as const;

export const PORTAL_PATHS = {
  entry: "/",
  portalRoot: "/AptusPortal",
  login: "/AptusPortal/Account/Login",
  loginSubmit: "/AptusPortal/Account/Login?ReturnUrl=%2fAptusPortal%2f",
  customerBooking: "/AptusPortal/CustomerBooking",
  calendar: "/AptusPortal/CustomerBooking/BookingCalendar",
  book: "/AptusPortal/CustomerBooking/Book",
  unbook: "/AptusPortal/CustomerBooking/Unbook",
} as const;

export const PORTAL_ROOT_SEGMENT = "aptusportal";

export const HOMEPAGE_TITLE = "Hem - Aptusportal";

export const FEEDBACK_MARKER = "FeedbackDialog";
export const BOOKED_PHRASE = "är bokat";
export const CANCELLED_PHRASE = "Ditt pass har blivit avbokat";

export const DEFAULT_MAX_LOGIN_REDIRECTS = 30;
export const DEFAULT_MAX_ACTION_REDIRECTS = 10;
