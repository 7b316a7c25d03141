import { createHash } from "crypto";
import { normalize } from "./normalize";

export const buildEventKey = (link: string, company: string) =>
  createHash("sha256")
    .update(`${link.trim()}|${normalize(company)}`)
    .digest("hex")
    .slice(0, 24);
