import { readFileSync } from "node:fs";
import bundledPolicy from "../policies/woocommerce.json";
import { ExtractionPolicy, ExtractionPolicySchema } from "../types";
import { formatZodIssues } from "./validation";

export function parseExtractionPolicy(input: unknown, source: string): ExtractionPolicy {
  const parsed = ExtractionPolicySchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`invalid extraction policy ${source}: ${formatZodIssues(parsed.error)}`);
  }

  if (parsed.data.nativeIdPattern) {
    try {
      new RegExp(parsed.data.nativeIdPattern);
    } catch (error) {
      throw new Error(`invalid extraction policy ${source}: nativeIdPattern is not a valid regular expression`, {
        cause: error
      });
    }
  }

  return parsed.data;
}

/** Loads the policy at `path`, or the bundled WooCommerce policy when none is given. */
export function loadExtractionPolicy(path?: string): ExtractionPolicy {
  if (!path) {
    return parseExtractionPolicy(bundledPolicy, "(bundled woocommerce)");
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new Error(`cannot read extraction policy ${path}`, { cause: error });
  }
  return parseExtractionPolicy(raw, path);
}
