/**
 * Tokens that look like attendance codes but are not.
 * Matched against the upper-cased candidate.
 */
export const FALSE_POSITIVE_CODES: ReadonlySet<string> = new Set([
  "HTTP", "HTTPS", "HTML", "CSS", "JSON", "XML",
  "USER", "PASS", "LOGIN", "AUTH", "TEST", "DEMO",
  "ADMIN", "ROOT", "NULL", "TRUE", "FALSE",
  "PASSWORD", "EMAIL", "NAME", "DATE", "TIME",
  "YEAR", "WEEK", "DAY", "MONTH",
]);

/**
 * Slot words the portal and lecturers spell differently.
 * Used when comparing a roster slot label with an on-screen entry.
 */
export const SLOT_SYNONYMS: Array<[RegExp, string]> = [
  [/laboratory/g, "lab"],
  [/tutorial/g, "tut"],
  [/practical/g, "prac"],
  [/session/g, "sess"],
];

/** Words around a code in mail that mark it as an explicit attendance code. */
export const CODE_LEAD_INS = [
  "attendance code",
  "your code",
  "verification code",
  "access code",
  "code",
];
