export * from './errors.js';
export * from './campaign/types.js';
export type { TurnAcceptor } from './campaign/capabilities.js';
export { MasterAgent, CAMPAIGN_STATE_VERSION } from './campaign/MasterAgent.js';
export type { CampaignDraft, MasterStatus, MergeResult, SceneRequest, MasterAgentOptions } from './campaign/MasterAgent.js';
export { SceneAgent } from './campaign/SceneAgent.js';
export type { SceneSeed, SceneStatus, DeltaInput, SceneAgentOptions } from './campaign/SceneAgent.js';
export { Orchestrator } from './campaign/Orchestrator.js';
export type { OrchestratorOptions, TurnResult } from './campaign/Orchestrator.js';
export { EffectChannel } from './campaign/EffectChannel.js';
export type { EffectJob, EffectStatus, EffectType, EffectListener } from './campaign/EffectChannel.js';
export { PlanningSession, planInteractively } from './campaign/PlanningSession.js';
export type { PlanningStep } from './campaign/PlanningSession.js';
export { buildContextWindow } from './campaign/contextBuilder.js';
export type { ContextWindow } from './campaign/contextBuilder.js';
export { bootstrapCampaign } from './campaign/bootstrap.js';
export type { BootstrapOptions, BootstrapResult } from './campaign/bootstrap.js';
export { HistoryBuffer, formatTurn } from './memory/HistoryBuffer.js';
export type { ContextView } from './memory/HistoryBuffer.js';
export { Compressor, chunkLines } from './memory/Compressor.js';
export type { Summarizer, SummarizeRequest, CompressionDecision, CompressionOutcome, CompressionContext } from './memory/Compressor.js';
export { detectBreak, isNpcRelevant } from './memory/breakDetector.js';
export type { BreakKind, BreakSignal } from './memory/breakDetector.js';
export { SaveStore, isUnreadableSave } from './persistence/SaveStore.js';
export type { ResumeResult, SaveEntry, CampaignSaver } from './persistence/SaveStore.js';
export { TranscriptStore } from './persistence/TranscriptStore.js';
export type { TranscriptWriter } from './persistence/TranscriptStore.js';
export { renderSave, parseSave, SUPPORTED_SAVE_VERSION, SAVE_EXTENSION } from './persistence/saveFormat.js';
export * from './collaborators/types.js';
export { NarratorAgent } from './agents/NarratorAgent.js';
export { SummarizeAgent } from './agents/SummarizeAgent.js';
export { PlannerAgent } from './agents/PlannerAgent.js';
export type { CampaignPlanner, PlanningExchange } from './agents/PlannerAgent.js';
export { createPromptEnvironment } from './agents/BaseAgent.js';
export { ConfigManager, DEFAULT_MEMORY_SETTINGS, DEFAULT_PERSISTENCE_SETTINGS } from './configManager.js';
export type { Config, LLMProfile, MemorySettings, PersistenceSettings } from './configManager.js';
