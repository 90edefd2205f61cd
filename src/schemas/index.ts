import type { DocumentSchema } from "../runtime/document.js";
import { achievements } from "./achievements.js";
import { archivesBook } from "./archives-book.js";
import { helper } from "./helper.js";
import { nature } from "./nature.js";

export { achievements, archivesBook, helper, nature };

export const builtinSchemas: readonly DocumentSchema<unknown>[] = [
  achievements,
  archivesBook,
  helper,
  nature,
];
