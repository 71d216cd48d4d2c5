import { readFile } from 'fs/promises';
import path from 'path';

import { createChildLogger } from '../utils/logger.js';
import { WorkflowTemplateError } from '../utils/errors.js';
import { jobDescriptorSchema, type JobDescriptor } from '../types/generation.types.js';

const logger = createChildLogger({ service: 'job-descriptor' });

export interface JobTemplateOptions {
  templatePath: string;
  /** Node whose `inputs.image` receives the uploaded asset name */
  loadImageNodeId: string;
  /** Node whose `inputs.filename_prefix` receives the output prefix */
  saveImageNodeId: string;
}

export interface JobParameters {
  assetName: string;
  outputPrefix: string;
}

/**
 * Fill the two parameter slots of a template; the template is left untouched
 */
export function applyJobParameters(
  template: JobDescriptor,
  slots: Pick<JobTemplateOptions, 'loadImageNodeId' | 'saveImageNodeId'>,
  params: JobParameters
): JobDescriptor {
  const descriptor = structuredClone(template);

  const loadNode = descriptor[slots.loadImageNodeId];
  const saveNode = descriptor[slots.saveImageNodeId];
  if (!loadNode) {
    throw new WorkflowTemplateError(`Workflow template has no load-image node "${slots.loadImageNodeId}"`);
  }
  if (!saveNode) {
    throw new WorkflowTemplateError(`Workflow template has no save-image node "${slots.saveImageNodeId}"`);
  }

  loadNode.inputs.image = params.assetName;
  saveNode.inputs.filename_prefix = params.outputPrefix;

  return descriptor;
}

/**
 * JobDescriptorService - reads the workflow template from disk on every build
 */
export class JobDescriptorService {
  private readonly templatePath: string;

  constructor(private readonly options: JobTemplateOptions) {
    this.templatePath = path.resolve(options.templatePath);
  }

  async loadTemplate(): Promise<JobDescriptor> {
    let raw: string;
    try {
      raw = await readFile(this.templatePath, 'utf-8');
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      throw new WorkflowTemplateError(`Cannot read workflow template ${this.templatePath}: ${errorMessage}`);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      throw new WorkflowTemplateError(`Workflow template ${this.templatePath} is not valid JSON: ${errorMessage}`);
    }

    const parsed = jobDescriptorSchema.safeParse(payload);
    if (!parsed.success) {
      throw new WorkflowTemplateError(
        `Workflow template ${this.templatePath} is not a workflow graph: ${parsed.error.issues
          .map((i) => `${i.path.join('.') || '(root)'} ${i.message}`)
          .join('; ')}`
      );
    }

    return parsed.data;
  }

  /**
   * Load the template once and check both slots exist; used at startup
   */
  async validate(): Promise<void> {
    const template = await this.loadTemplate();
    applyJobParameters(template, this.options, { assetName: 'startup-check.png', outputPrefix: 'startup-check' });
    logger.info(
      {
        templatePath: this.templatePath,
        nodes: Object.keys(template).length,
        loadImageNodeId: this.options.loadImageNodeId,
        saveImageNodeId: this.options.saveImageNodeId,
      },
      'Workflow template validated'
    );
  }

  async build(params: JobParameters): Promise<JobDescriptor> {
    const template = await this.loadTemplate();
    const descriptor = applyJobParameters(template, this.options, params);
    logger.debug({ ...params }, 'Job descriptor built');
    return descriptor;
  }
}
