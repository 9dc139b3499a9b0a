// src/date.ts

// RFC 1123 date in GMT, e.g. `Sun, 06 Nov 1994 08:49:37 GMT`.
export function httpDate(date: Date = new Date()): string {
    return date.toUTCString();
}
