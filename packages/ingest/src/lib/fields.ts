import { dedupe, normalizeWhitespace } from "./normalize";
import type { ExtractedFields, TextField } from "./types";

type FieldRule = {
  field: TextField;
  label: RegExp;
  fallback?: RegExp;
  clean: (value: string) => string;
};

const MAX_VALUE_LENGTH = 160;

// A free-text value ends where the next known label starts, or at a sentence break.
const VALUE_BOUNDARY =
  /\s+(?=(?:date|time|dial[\s-]*in|universal\s+access|hosted\s*by|moderator|organi[sz]ed\s*by|registration(?:\s+link)?|register(?:\s+(?:at|here))?|contacts?|e-?mail|phone|tel)\b\s*[:-])|[;|]\s|\.(?:\s|$)/i;

const EMAIL_PATTERN = /[\w.-]+@[\w.-]+\.\w+/g;
const PHONE_PATTERN = /\+?\d[\d\s\-()]{7,}\d/g;
const MIN_PHONE_DIGITS = 7;

export const clipValue = (value: string) => {
  const boundary = value.search(VALUE_BOUNDARY);
  const clipped = boundary >= 0 ? value.slice(0, boundary) : value;
  return clipped.trim().slice(0, MAX_VALUE_LENGTH).trim();
};

const cleanUrl = (value: string) => value.trim().replace(/[).,;]+$/, "");

const cleanTime = (value: string) => normalizeWhitespace(value).replace(/\s*(?:IST|hrs)$/i, "");

export const FIELD_RULES: FieldRule[] = [
  {
    field: "date",
    label:
      /\bdate\b\s*[:-]?\s*(?:[A-Za-z]+day,?\s+)?(\d{1,2}(?:st|nd|rd|th)?[\s\-/.]+[A-Za-z]{3,9}[\s\-/.,]+\d{4}|[A-Za-z]{3,9}\.?\s+\d{1,2}(?:st|nd|rd|th)?,?\s+\d{4})/i,
    fallback: /\b(\d{1,2}-[A-Za-z]{3}-\d{4})\b/,
    clean: normalizeWhitespace,
  },
  {
    field: "time",
    label: /\b(?:time|at)\b\s*[:-]?\s*(\d{1,2}:\d{2}(?:\s*(?:AM|PM))?(?:\s*IST)?)/i,
    fallback: /\b(\d{1,2}:\d{2}\s*(?:AM|PM))\b/i,
    clean: cleanTime,
  },
  {
    field: "dialIn",
    label:
      /\b(?:dial[\s-]*in(?:\s+(?:numbers?|details))?|universal\s+access(?:\s+numbers?)?)\s*[:-]?\s*(.+)/i,
    clean: clipValue,
  },
  {
    field: "registrationLink",
    label: /\b(?:registration(?:\s+link)?|register(?:\s+(?:at|here))?)\s*[:-]?\s*(https?:\/\/\S+)/i,
    fallback: /(https?:\/\/\S*diamondpass\S*)/i,
    clean: cleanUrl,
  },
  {
    field: "host",
    label: /\b(?:hosted\s*by|moderator|organi[sz]ed\s*by)\s*[:-]?\s*(.+)/i,
    clean: clipValue,
  },
];

export const emptyFields = (): ExtractedFields => ({
  date: "",
  time: "",
  dialIn: "",
  registrationLink: "",
  host: "",
  contacts: [],
});

const findField = (text: string, rule: FieldRule) => {
  for (const pattern of [rule.label, rule.fallback]) {
    if (!pattern) {
      continue;
    }
    const captured = pattern.exec(text)?.[1];
    if (captured) {
      const value = rule.clean(captured);
      if (value) {
        return value;
      }
    }
  }
  return "";
};

export const harvestContacts = (text: string) => {
  const emails = (text.match(EMAIL_PATTERN) ?? []).map((email) => email.trim());
  const phones = (text.match(PHONE_PATTERN) ?? [])
    .map((phone) => normalizeWhitespace(phone))
    .filter((phone) => phone.replace(/\D/g, "").length >= MIN_PHONE_DIGITS);
  return dedupe([...emails, ...phones]);
};

export const extractFieldsFromText = (raw: string): ExtractedFields => {
  const text = normalizeWhitespace(raw);
  const fields = emptyFields();
  if (!text) {
    return fields;
  }

  for (const rule of FIELD_RULES) {
    fields[rule.field] = findField(text, rule);
  }
  fields.contacts = harvestContacts(text);
  return fields;
};
