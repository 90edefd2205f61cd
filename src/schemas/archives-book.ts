import { defineDocument } from "../runtime/document.js";
import * as s from "../runtime/schema.js";

export const archivesBookEntry = s.record(
  s.field("bookid", s.i32),
  s.field("chapterid", s.i32),
  s.field("chaptername", s.str),
  s.field("id", s.i32),
  s.field("txt", s.array(s.str)),
  s.field("txtdivide", s.array(s.i32)),
);

export type ArchivesBookEntry = s.Infer<typeof archivesBookEntry>;

export const archivesBook = defineDocument(
  "archivesBook",
  s.record(s.field("data", s.list(archivesBookEntry))),
);
