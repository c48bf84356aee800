export enum LlmProvider {
  OPENAI = "openai",
  GEMINI = "gemini",
}

export enum PlanStatus {
  DRAFT = "draft",
  SAVED = "saved",
}

export enum UpstreamService {
  COMPLETION = "completion",
  SEARCH = "search",
  WEATHER = "weather",
}
