import { createCloudinaryBackend } from './cloudinary';
import type { ServerConfig } from './config';
import { createGenerationOrchestrator, type GenerationOrchestrator } from './generate';
import { createGeminiTextModel } from './promptEnhancer/gemini';
import { createEnhancementClient } from './promptEnhancer/runtime';
import { createArtifactStore } from './storage';
import { createGenAiVideoOperations, createVeoApi } from './veo';
import { createGenerationClient } from './video';

export interface Pipeline {
  orchestrator: GenerationOrchestrator;
  cdnEnabled: boolean;
}

export function buildPipeline(config: ServerConfig): Pipeline {
  const lengthPolicy = { maxLength: config.prompt.maxLength, overflowPolicy: config.prompt.overflowPolicy };

  const enhancer = createEnhancementClient({
    textModel: createGeminiTextModel({ apiKey: config.gemini.apiKey, model: config.gemini.textModel }),
    timeoutMs: config.enhancer.timeoutMs,
    enabled: config.enhancer.enabled,
    lengthPolicy,
  });

  const veo = createVeoApi({
    operations: createGenAiVideoOperations({
      apiKey: config.gemini.apiKey,
      model: config.gemini.videoModel,
      baseUrl: config.gemini.apiBaseUrl,
    }),
    apiKey: config.gemini.apiKey,
    apiBaseUrl: config.gemini.apiBaseUrl,
    requestTimeoutMs: config.remoteRequestTimeoutMs,
  });

  const store = createArtifactStore({
    cdn: config.cloudinary ? createCloudinaryBackend(config.cloudinary) : null,
    openResult: veo.openResult,
    folder: config.storage.folder,
    localDir: config.storage.localDir,
    uploadRetryDelayMs: config.storage.uploadRetryDelayMs,
    downloadTimeoutMs: config.storage.downloadTimeoutMs,
  });

  if (!store.cdnEnabled) {
    console.warn('[Storage] Cloudinary credentials not set; videos will be stored locally only.');
  }

  const orchestrator = createGenerationOrchestrator({
    enhancer,
    generator: createGenerationClient({ api: veo, polling: config.polling }),
    store,
    lengthPolicy,
    filenamePrefix: config.storage.filenamePrefix,
  });

  return { orchestrator, cdnEnabled: store.cdnEnabled };
}
