import {
  NAME_MAX_LENGTH,
  NAME_MIN_LENGTH,
  NAME_PATTERN,
  NAME_SUGGESTION_COUNT,
} from "shared";

/** Returns a reason string when the name is unusable, otherwise null */
export function validateName(name: string): string | null {
  if (name.length < NAME_MIN_LENGTH || name.length > NAME_MAX_LENGTH) {
    return `Name must be ${NAME_MIN_LENGTH}-${NAME_MAX_LENGTH} characters`;
  }
  if (!NAME_PATTERN.test(name)) {
    return "Name may only contain letters, digits, spaces and _ - .";
  }
  if (name.trim() !== name) {
    return "Name may not start or end with a space";
  }
  return null;
}

/** Names compare case-insensitively for uniqueness */
export function nameKey(name: string): string {
  return name.toLowerCase();
}

/** Free, valid alternatives to a taken name: "Bob" → "Bob1", "Bob2", ... */
export function suggestNames(
  name: string,
  isTaken: (candidate: string) => boolean,
  count: number = NAME_SUGGESTION_COUNT,
): string[] {
  const suggestions: string[] = [];
  for (let n = 1; suggestions.length < count && n <= 999; n++) {
    const suffix = String(n);
    const base = name.slice(0, NAME_MAX_LENGTH - suffix.length);
    const candidate = `${base}${suffix}`;
    if (validateName(candidate) === null && !isTaken(candidate)) {
      suggestions.push(candidate);
    }
  }
  return suggestions;
}
