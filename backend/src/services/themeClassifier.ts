import Anthropic from "@anthropic-ai/sdk";
import { GoogleGenerativeAI } from "@google/generative-ai";
import { z } from "zod";
import type { Provider } from "../config.js";
import { ClassificationError, ConfigMissingError } from "../errors.js";
import type { StoredHighlight, ThemeClassifier } from "../types.js";

export const THEMES = [
  "Philosophy",
  "Psychology",
  "Finance & Investing",
  "Software Engineering",
  "Productivity",
  "History",
  "Science",
  "Business",
  "Fiction",
  "Biography"
] as const;

export const FALLBACK_THEME = "General";
export const DEFAULT_MIN_CONFIDENCE = 0.3;

const responseSchema = z.object({
  theme: z.string().min(1),
  confidence: z.coerce.number().min(0).max(1)
});

export type ThemeClassifierOptions = {
  provider: Provider;
  apiKey?: string;
  model?: string;
  minConfidence?: number;
};

function resolveDefaultModel(provider: Provider): string {
  return provider === "anthropic"
    ? "claude-3-5-haiku-latest"
    : provider === "gemini"
      ? "gemini-1.5-flash"
      : "openai/gpt-4o-mini";
}

export function buildClassificationPrompt(title: string, author: string): string {
  return [
    "You sort books into reading themes.",
    "Choose the single best theme for the book below from this list:",
    THEMES.map((theme) => `- ${theme}`).join("\n"),
    "Output JSON only, with this exact format:",
    '{"theme":"...","confidence":0.0}',
    "confidence is your probability (0 to 1) that the theme is correct.",
    "",
    `Book: ${title} by ${author}`
  ].join("\n");
}

function extractJsonPayload(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed.startsWith("{") && trimmed.endsWith("}")) {
    return trimmed;
  }

  const fenceMatch = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fenceMatch?.[1]) {
    return fenceMatch[1].trim();
  }

  const start = trimmed.indexOf("{");
  const end = trimmed.lastIndexOf("}");
  if (start >= 0 && end > start) {
    return trimmed.slice(start, end + 1);
  }

  throw new ClassificationError("Model response did not contain JSON.");
}

/**
 * Maps a raw model reply onto the theme list. Labels outside the list and
 * answers at or under the confidence threshold become "General".
 */
export function resolveTheme(raw: string, minConfidence = DEFAULT_MIN_CONFIDENCE): string {
  let payload: unknown;
  try {
    payload = JSON.parse(extractJsonPayload(raw));
  } catch (error) {
    if (error instanceof ClassificationError) {
      throw error;
    }
    throw new ClassificationError("Model response was not valid JSON.", { cause: error });
  }

  const parsed = responseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ClassificationError("Model response did not match the expected shape.", {
      cause: parsed.error
    });
  }

  const label = THEMES.find(
    (theme) => theme.toLowerCase() === parsed.data.theme.trim().toLowerCase()
  );
  if (!label || parsed.data.confidence <= minConfidence) {
    return FALLBACK_THEME;
  }
  return label;
}

async function runAnthropic(prompt: string, model: string, apiKey: string): Promise<string> {
  const client = new Anthropic({ apiKey });
  const response = await client.messages.create({
    model,
    max_tokens: 100,
    temperature: 0,
    messages: [
      {
        role: "user",
        content: prompt
      }
    ]
  });

  return response.content
    .filter((item) => item.type === "text")
    .map((item) => item.text)
    .join("\n");
}

async function runGemini(prompt: string, model: string, apiKey: string): Promise<string> {
  const client = new GoogleGenerativeAI(apiKey);
  const modelApi = client.getGenerativeModel({ model });
  const response = await modelApi.generateContent(prompt);
  return response.response.text();
}

async function runOpenRouter(prompt: string, model: string, apiKey: string): Promise<string> {
  const response = await fetch("https://openrouter.ai/api/v1/chat/completions", {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      Authorization: `Bearer ${apiKey}`
    },
    body: JSON.stringify({
      model,
      temperature: 0,
      messages: [
        {
          role: "user",
          content: prompt
        }
      ]
    })
  });

  if (!response.ok) {
    const body = await response.text();
    throw new ClassificationError(`OpenRouter request failed: ${response.status} ${body}`);
  }

  const body = (await response.json()) as {
    choices?: Array<{ message?: { content?: string } }>;
  };

  const text = body.choices?.[0]?.message?.content;
  if (!text) {
    throw new ClassificationError("OpenRouter returned an empty response.");
  }

  return text;
}

export function createLlmThemeClassifier(options: ThemeClassifierOptions): ThemeClassifier {
  const provider = options.provider;
  const model = options.model || resolveDefaultModel(provider);
  const minConfidence = options.minConfidence ?? DEFAULT_MIN_CONFIDENCE;

  return {
    async classify(title: string, author: string): Promise<string> {
      const apiKey = options.apiKey?.trim();
      if (!apiKey) {
        throw new ConfigMissingError(`${provider.toUpperCase()}_API_KEY`);
      }

      const prompt = buildClassificationPrompt(title, author);
      let rawResponse = "";
      try {
        if (provider === "anthropic") {
          rawResponse = await runAnthropic(prompt, model, apiKey);
        } else if (provider === "gemini") {
          rawResponse = await runGemini(prompt, model, apiKey);
        } else {
          rawResponse = await runOpenRouter(prompt, model, apiKey);
        }
      } catch (error) {
        if (error instanceof ClassificationError) {
          throw error;
        }
        throw new ClassificationError(
          error instanceof Error ? error.message : `Classification request to ${provider} failed.`,
          { cause: error }
        );
      }

      return resolveTheme(rawResponse, minConfidence);
    }
  };
}

export type ThemeAssignment = {
  title: string;
  author: string;
  theme: string;
};

/**
 * Attaches a theme to every record that lacks one. Each (title, author) pair
 * is classified once; records that already have a theme are left alone.
 */
export async function applyThemes(
  highlights: StoredHighlight[],
  classifier: ThemeClassifier
): Promise<{ highlights: StoredHighlight[]; classified: ThemeAssignment[] }> {
  const pending = new Map<string, { title: string; author: string }>();
  for (const highlight of highlights) {
    if (highlight.theme) {
      continue;
    }
    const key = JSON.stringify([highlight.title, highlight.author]);
    if (!pending.has(key)) {
      pending.set(key, { title: highlight.title, author: highlight.author });
    }
  }

  const themes = new Map<string, string>();
  const classified: ThemeAssignment[] = [];
  for (const [key, book] of pending) {
    const theme = await classifier.classify(book.title, book.author);
    themes.set(key, theme);
    classified.push({ ...book, theme });
  }

  return {
    highlights: highlights.map((highlight) => {
      if (highlight.theme) {
        return highlight;
      }
      const theme = themes.get(JSON.stringify([highlight.title, highlight.author]));
      return theme ? { ...highlight, theme } : highlight;
    }),
    classified
  };
}
