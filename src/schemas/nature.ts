import { defineDocument } from "../runtime/document.js";
import * as s from "../runtime/schema.js";

const round2 = (v: number) => Math.round(v * 100) / 100;

/** Stat multipliers are stored as f32; two decimals is what the client shows. */
const stat = s.map(s.f32, round2);

export const natureItem = s.record(
  s.field("des", s.str),
  s.field("des2", s.str),
  s.field("id", s.i32),
  s.field("spAtk", stat),
  s.field("spDef", stat),
  s.field("atk", stat),
  s.field("def", stat),
  s.field("spd", stat),
  s.field("name", s.str),
);

export type NatureItem = s.Infer<typeof natureItem>;

export const nature = defineDocument(
  "nature",
  s.record(s.field("nature", s.array(natureItem))),
);
