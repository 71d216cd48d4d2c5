import type { AppConfig } from '../config/index.js';
import { StabilityBackgroundRemovalProvider } from '../providers/implementations/stability-background-removal.provider.js';
import type { BackgroundRemovalProvider } from '../providers/interfaces/background-removal.provider.js';
import { CompletionWatcher } from './completion-watcher.service.js';
import { CompositorService } from './compositor.service.js';
import { GenerationClient, buildGenerationEndpoints } from './generation-client.service.js';
import { JobDescriptorService } from './job-descriptor.service.js';
import { LocalImageStorage } from './local-storage.service.js';
import { MergePipeline } from './merge-pipeline.service.js';
import { Publisher } from './publisher.service.js';

/**
 * Everything the HTTP layer needs, wired from configuration
 */
export interface MergeServices {
  storage: LocalImageStorage;
  jobDescriptors: JobDescriptorService;
  pipeline: MergePipeline;
  backgroundRemoval: BackgroundRemovalProvider;
}

export function createMergeServices(
  config: AppConfig,
  backgroundRemoval: BackgroundRemovalProvider = new StabilityBackgroundRemovalProvider({
    apiKey: config.apis.stability,
    apiBase: config.apis.stabilityBase,
  })
): MergeServices {
  const { generation } = config;
  const endpoints = buildGenerationEndpoints(generation.host, generation.secure);

  const storage = new LocalImageStorage({
    mergedDir: config.storage.mergedImagesDir,
    finalDir: config.storage.finalImagesDir,
  });
  const client = new GenerationClient(endpoints.httpBaseUrl);
  const jobDescriptors = new JobDescriptorService({
    templatePath: generation.workflowTemplatePath,
    loadImageNodeId: generation.loadImageNodeId,
    saveImageNodeId: generation.saveImageNodeId,
  });

  const pipeline = new MergePipeline({
    compositor: new CompositorService(backgroundRemoval),
    storage,
    client,
    jobDescriptors,
    watcher: new CompletionWatcher({
      wsBaseUrl: endpoints.wsBaseUrl,
      client,
      storage,
      defaultTimeoutMs: generation.completionTimeoutMs,
    }),
    publisher: new Publisher(config.ftp),
    outputPrefix: generation.outputPrefix,
    publicBaseUrl: config.publicBaseUrl,
  });

  return { storage, jobDescriptors, pipeline, backgroundRemoval };
}

/**
 * Configuration gaps that let the server start but make every merge fail
 */
export function getStartupWarnings(
  config: Pick<AppConfig, 'publicBaseUrl'>,
  services: Pick<MergeServices, 'backgroundRemoval'>
): string[] {
  const warnings: string[] = [];

  if (!services.backgroundRemoval.isAvailable()) {
    warnings.push(
      `Background removal provider "${services.backgroundRemoval.providerId}" is not configured; merges will fail before compositing`
    );
  }
  if (!config.publicBaseUrl) {
    warnings.push('BASE_PUBLIC_URL is not set; merges will fail after publishing');
  }

  return warnings;
}
