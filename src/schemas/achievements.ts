import { defineDocument } from "../runtime/document.js";
import * as s from "../runtime/schema.js";

export const ruleItem = s.record(
  s.field("abilityTitle", s.i32),
  s.field("achievementPoint", s.i32),
  s.field("desc", s.str),
  s.field("id", s.i32),
  s.field("speNameBonus", s.i32),
  s.field("threshold", s.str),
  s.field("abtext", s.str),
  s.field("achName", s.str),
  s.field("hide", s.i32),
  s.field("proicon", s.i32),
  s.field("title", s.str),
  s.field("titleColor", s.str),
);

export const branchItem = s.record(
  s.field("desc", s.str),
  s.field("id", s.i32),
  s.field("isSingle", s.i32),
  s.field("rule", s.array(ruleItem)),
  s.field("text", s.str),
  s.field("isShowPro", s.i32),
);

export const branchesItem = s.record(
  s.field("branch", s.array(branchItem)),
);

export const typeItem = s.record(
  s.field("branches", s.array(branchesItem)),
  s.field("desc", s.str),
  s.field("id", s.i32),
);

export type AchievementRule = s.Infer<typeof ruleItem>;
export type AchievementBranch = s.Infer<typeof branchItem>;
export type AchievementType = s.Infer<typeof typeItem>;

export const achievements = defineDocument(
  "achievements",
  s.record(
    s.field("achievementRules", s.record(s.field("type", s.array(typeItem)))),
  ),
);
