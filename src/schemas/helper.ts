import { defineDocument } from "../runtime/document.js";
import * as s from "../runtime/schema.js";

export const helperInfo = s.record(
  s.field("group", s.i32),
  s.field("id", s.i32),
  s.field("jump", s.str),
  s.field("node", s.str),
  s.field("picture", s.str),
  s.field("searchword", s.str),
  s.field("text", s.str),
  s.field("title", s.str),
  s.field("type", s.i32),
);

export type HelperInfo = s.Infer<typeof helperInfo>;

// The collection directly follows the root gate, with no gate of its own.
export const helper = defineDocument(
  "helper",
  s.record(s.field("data", s.list(helperInfo))),
);
