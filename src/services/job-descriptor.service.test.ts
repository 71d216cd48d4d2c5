import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';

vi.mock('../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

import { JobDescriptorService, applyJobParameters } from './job-descriptor.service.js';
import { WorkflowTemplateError } from '../utils/errors.js';

const template = {
  '16': { class_type: 'LoadImage', inputs: { image: 'placeholder.png' } },
  '35': { class_type: 'SaveImage', inputs: { filename_prefix: 'merged_output', images: ['8', 0] } },
  '8': { class_type: 'VAEDecode', inputs: { samples: ['3', 0] } },
};

const slots = { loadImageNodeId: '16', saveImageNodeId: '35' };

describe('applyJobParameters', () => {
  it('should set the asset name and output prefix', () => {
    const descriptor = applyJobParameters(template, slots, {
      assetName: 'merged_result_20240102_030405678000.png',
      outputPrefix: 'merged_output_20240102_030405678000',
    });

    expect(descriptor['16'].inputs).toEqual({ image: 'merged_result_20240102_030405678000.png' });
    expect(descriptor['35'].inputs).toEqual({
      filename_prefix: 'merged_output_20240102_030405678000',
      images: ['8', 0],
    });
    expect(descriptor['8']).toEqual(template['8']);
  });

  it('should not modify the template', () => {
    applyJobParameters(template, slots, { assetName: 'a.png', outputPrefix: 'p' });

    expect(template['16'].inputs.image).toBe('placeholder.png');
    expect(template['35'].inputs.filename_prefix).toBe('merged_output');
  });

  it('should reject a template without the load-image node', () => {
    expect(() =>
      applyJobParameters(template, { ...slots, loadImageNodeId: '99' }, { assetName: 'a.png', outputPrefix: 'p' })
    ).toThrow('Workflow template has no load-image node "99"');
  });

  it('should reject a template without the save-image node', () => {
    expect(() =>
      applyJobParameters(template, { ...slots, saveImageNodeId: '42' }, { assetName: 'a.png', outputPrefix: 'p' })
    ).toThrow(WorkflowTemplateError);
  });
});

describe('JobDescriptorService', () => {
  let dir: string;
  let templatePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'job-descriptor-'));
    templatePath = path.join(dir, 'workflow.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should build a descriptor from the template file', async () => {
    await writeFile(templatePath, JSON.stringify(template));
    const service = new JobDescriptorService({ templatePath, ...slots });

    const descriptor = await service.build({ assetName: 'asset.png', outputPrefix: 'out_1' });

    expect(descriptor['16'].inputs.image).toBe('asset.png');
    expect(descriptor['35'].inputs.filename_prefix).toBe('out_1');
  });

  it('should pick up template edits between builds', async () => {
    await writeFile(templatePath, JSON.stringify(template));
    const service = new JobDescriptorService({ templatePath, ...slots });
    await service.build({ assetName: 'a.png', outputPrefix: 'p' });

    await writeFile(
      templatePath,
      JSON.stringify({ ...template, '3': { class_type: 'KSampler', inputs: { seed: 7 } } })
    );
    const descriptor = await service.build({ assetName: 'b.png', outputPrefix: 'q' });

    expect(descriptor['3'].inputs).toEqual({ seed: 7 });
  });

  it('should validate a good template', async () => {
    await writeFile(templatePath, JSON.stringify(template));

    await expect(new JobDescriptorService({ templatePath, ...slots }).validate()).resolves.toBeUndefined();
  });

  it('should fail validation when a slot node is missing', async () => {
    await writeFile(templatePath, JSON.stringify({ '16': template['16'] }));

    await expect(new JobDescriptorService({ templatePath, ...slots }).validate()).rejects.toThrow(
      'Workflow template has no save-image node "35"'
    );
  });

  it('should report a missing template file', async () => {
    const service = new JobDescriptorService({ templatePath: path.join(dir, 'absent.json'), ...slots });

    await expect(service.loadTemplate()).rejects.toBeInstanceOf(WorkflowTemplateError);
  });

  it('should report invalid JSON', async () => {
    await writeFile(templatePath, '{ "16": ');

    await expect(new JobDescriptorService({ templatePath, ...slots }).loadTemplate()).rejects.toThrow(
      /is not valid JSON/
    );
  });

  it('should report nodes without inputs', async () => {
    await writeFile(templatePath, JSON.stringify({ '16': { class_type: 'LoadImage' } }));

    await expect(new JobDescriptorService({ templatePath, ...slots }).loadTemplate()).rejects.toThrow(
      `Workflow template ${templatePath} is not a workflow graph: 16.inputs Required`
    );
  });

  it('should accept the bundled workflow template', async () => {
    const service = new JobDescriptorService({
      templatePath: path.resolve('workflows/merge-workflow.json'),
      ...slots,
    });

    const descriptor = await service.build({ assetName: 'asset.png', outputPrefix: 'merged_output_1' });

    expect(descriptor['16'].class_type).toBe('LoadImage');
    expect(descriptor['35'].class_type).toBe('SaveImage');
    expect(descriptor['35'].inputs.filename_prefix).toBe('merged_output_1');
  });
});
