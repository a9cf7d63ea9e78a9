import { z } from "zod";
import { ValidationError } from "@solace/shared";
import type {
  NonEmptyList,
  ReplyCategory,
  ResponseCategory,
} from "../types/index.js";

/**
 * Pre-authored reply variants and coping tips. Pure lookups: no model call,
 * no per-request state.
 */

// ---------------------------------------------------------------------------
// Crisis message
// ---------------------------------------------------------------------------

/**
 * Substrings of which a crisis message must contain at least one, so it can
 * never ship without a way to reach emergency help.
 */
export const EMERGENCY_CONTACT_MARKERS = [
  "112",
  "911",
  "999",
  "988",
  "findahelpline.com",
] as const;

export const CRISIS_MESSAGE =
  "I'm really sorry you're feeling this way. Your life matters and you deserve support. " +
  "If you're in immediate danger, please call your local emergency number (e.g., 112/911/999).\n\n" +
  "You can reach a crisis line right now:\n" +
  "- International: https://findahelpline.com/\n" +
  "- India: AASRA +91-9820466726 | https://aasra.info/\n" +
  "- US: 988 Suicide & Crisis Lifeline (call/text 988) | https://988lifeline.org/\n\n" +
  "I'm here to listen. Would you like to tell me a little more about what's on your mind?";

// ---------------------------------------------------------------------------
// Reply variants per category
// ---------------------------------------------------------------------------

export const REPLY_CATEGORIES = [
  "negative_strong",
  "negative_mild",
  "sadness",
  "anger",
  "fear",
  "disgust",
  "joy",
  "neutral",
] as const satisfies readonly ReplyCategory[];

export const DEFAULT_REPLY_TEMPLATES: Record<
  ReplyCategory,
  NonEmptyList<string>
> = {
  negative_strong: [
    "That sounds really tough, and it's completely okay to feel this way. " +
      "You don't have to handle everything at once. Maybe try a small grounding step: " +
      "take 3 slow breaths (in 4s, hold 4s, out 6s). If you'd like, we can break the situation " +
      "into smaller parts together. What part feels heaviest right now?",
    "That's a lot to carry, and it makes sense that it hurts. " +
      "Let's slow things down: one breath in for 4, out for 6. " +
      "We don't need to fix it all right now. What's pressing on you the most?",
  ],
  negative_mild: [
    "I hear some heaviness in what you shared. You're not alone. " +
      "What would feel most supportive for you right now—venting, problem-solving, or a simple check-in?",
    "It sounds like something's weighing on you a little. I'm here for it. " +
      "Would it help to talk it through, or just name what's bothering you?",
  ],
  sadness: [
    "It sounds really heavy. It's okay to feel sad. A tiny step like writing down one worry or taking a 2‑minute stretch can help. What feels smallest to try?",
    "I’m hearing a lot of weight in this. You deserve gentleness right now. Could a short break with some music or a warm drink help even 1%?",
  ],
  anger: [
    "That anger makes sense if things feel unfair. Want to try a 10‑second pause—inhale 4, hold 4, exhale 6—then we can sort what’s in your control?",
    "Your feelings are valid. We can channel this energy. Would listing the top 1–2 triggers help us plan a next step?",
  ],
  fear: [
    "When worry spikes, your body is trying to protect you. Let’s ground: name 5 things you see, 4 you feel, 3 you hear. I’m with you.",
    "Anxiety can feel loud. Let’s shrink the moment: what’s the next tiny action (30 seconds or less) you could take?",
  ],
  disgust: [
    "Feeling turned off or disappointed can be protective. If you zoom out, is there a boundary you’d like to set to feel safer?",
    "It’s okay to step back from what doesn’t feel right. What would a kinder environment look like for you today?",
  ],
  joy: [
    "I love the hopeful energy here. What helped you get to this point today? Let’s note a small win to carry forward.",
    "That spark matters. What would help you keep this momentum for the next hour?",
  ],
  neutral: [
    "Thanks for sharing. I’m here with you. What’s one small action that could make the next hour a bit easier?",
    "I’m listening. If you’d like, we can choose between venting, problem‑solving, or a simple check‑in.",
  ],
};

// ---------------------------------------------------------------------------
// Coping tips (negative, non-crisis categories only)
// ---------------------------------------------------------------------------

export const DEFAULT_COPING_TIPS: NonEmptyList<string> = [
  "Mini reset: inhale 4, hold 4, exhale 6.",
  "Micro‑action: sip water and roll your shoulders.",
  "Grounding: name 5 things you can see right now.",
  "30‑second pause: look out a window or step away from the screen.",
];

/** Shown alongside every coping tip. */
export const DEFAULT_ENCOURAGEMENT = "You matter. I'm here with you. 💙";

// ---------------------------------------------------------------------------
// Template bank
// ---------------------------------------------------------------------------

export interface TemplateBank {
  /** The single, never-varied reply for the `crisis` category. */
  readonly crisisMessage: string;
  /** Ordered reply variants; for `crisis` a one-element list. */
  templatesFor(category: ResponseCategory): NonEmptyList<string>;
  tips(): NonEmptyList<string>;
  /** Fixed line that accompanies a coping tip. */
  readonly encouragement: string;
}

export interface TemplateBankOverrides {
  replies?: Partial<Record<ReplyCategory, readonly string[]>>;
  tips?: readonly string[];
  encouragement?: string;
  crisisMessage?: string;
}

const templateListSchema = z.array(z.string().trim().min(1)).nonempty();

const crisisMessageSchema = z
  .string()
  .trim()
  .min(1)
  .refine(
    (message) =>
      EMERGENCY_CONTACT_MARKERS.some((marker) => message.includes(marker)),
    { message: "Crisis message must include an emergency contact" },
  );

function validateList(
  list: readonly string[],
  field: string,
): NonEmptyList<string> {
  const result = templateListSchema.safeParse(list);
  if (!result.success) {
    throw new ValidationError(
      `Template list "${field}" must contain at least one non-blank string`,
      {
        code: "INVALID_TEMPLATE_BANK",
        cause: result.error,
        context: { field },
      },
    );
  }
  return Object.freeze(result.data);
}

/**
 * Builds an immutable template bank, replacing only the lists named in
 * `overrides`. Throws `ValidationError` for an empty list, a blank entry or
 * encouragement, or a crisis message without an emergency contact.
 */
export function createTemplateBank(
  overrides: TemplateBankOverrides = {},
): TemplateBank {
  const list = (category: ReplyCategory) =>
    validateList(
      overrides.replies?.[category] ?? DEFAULT_REPLY_TEMPLATES[category],
      category,
    );

  const replies: Readonly<Record<ReplyCategory, NonEmptyList<string>>> =
    Object.freeze({
      negative_strong: list("negative_strong"),
      negative_mild: list("negative_mild"),
      sadness: list("sadness"),
      anger: list("anger"),
      fear: list("fear"),
      disgust: list("disgust"),
      joy: list("joy"),
      neutral: list("neutral"),
    });

  const tips = validateList(overrides.tips ?? DEFAULT_COPING_TIPS, "tips");
  const [encouragement] = validateList(
    [overrides.encouragement ?? DEFAULT_ENCOURAGEMENT],
    "encouragement",
  );

  const crisis = crisisMessageSchema.safeParse(
    overrides.crisisMessage ?? CRISIS_MESSAGE,
  );
  if (!crisis.success) {
    throw new ValidationError(
      "Crisis message must be non-blank and include an emergency contact",
      {
        code: "INVALID_TEMPLATE_BANK",
        cause: crisis.error,
        context: { field: "crisisMessage" },
      },
    );
  }
  const crisisMessage = crisis.data;
  const crisisList: NonEmptyList<string> = Object.freeze([
    crisisMessage,
  ] as const);

  return Object.freeze({
    crisisMessage,
    templatesFor(category: ResponseCategory): NonEmptyList<string> {
      return category === "crisis" ? crisisList : replies[category];
    },
    tips(): NonEmptyList<string> {
      return tips;
    },
    encouragement,
  });
}
