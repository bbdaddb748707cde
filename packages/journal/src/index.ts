export { Journal, JournalIntegrityError } from "./journal.js";
export type { JournalOptions } from "./journal.js";
