import { FeatureCollectionSchema, type SeismicEvent } from "@quakewatch/types";
import { eventFromFeature } from "./event";
import { ParseError } from "./errors";

export function parseFeedResponse(raw: string): SeismicEvent[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ParseError("Response body is not valid JSON", { cause: err });
  }

  const result = FeatureCollectionSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length ? issue.path.join(".") : "payload";
    throw new ParseError(`Unexpected payload at ${where}: ${issue?.message ?? "invalid"}`, {
      cause: result.error,
    });
  }

  return result.data.features.map(eventFromFeature);
}
