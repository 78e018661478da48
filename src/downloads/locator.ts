import { z } from "zod";

const YOUTUBE_URL_PATTERN =
  /^(https?:\/\/)?(www\.|m\.|music\.)?(youtube|youtu|youtube-nocookie)\.(com|be)\/\S+$/i;

export const locatorSchema = z
  .string()
  .trim()
  .min(1, "Empty locator")
  .max(2048, "Locator too long")
  .regex(YOUTUBE_URL_PATTERN, "Not a YouTube URL");

export function parseLocator(input: string): string | undefined {
  const result = locatorSchema.safeParse(input);
  return result.success ? result.data : undefined;
}
