export {
  DEFAULT_CRISIS_PHRASES,
  createCrisisLexicon,
  extendCrisisLexicon,
  type CrisisLexicon,
} from "./crisisLexicon.js";
export {
  CRISIS_MESSAGE,
  EMERGENCY_CONTACT_MARKERS,
  REPLY_CATEGORIES,
  DEFAULT_REPLY_TEMPLATES,
  DEFAULT_COPING_TIPS,
  DEFAULT_ENCOURAGEMENT,
  createTemplateBank,
  type TemplateBank,
  type TemplateBankOverrides,
} from "./supportTemplates.js";
