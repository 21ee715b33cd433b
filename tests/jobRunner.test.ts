/**
 * Tests for running jobs through pipelines: completion, failure, cancellation and output lookup
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { JobRegistry } from '../src/jobs/JobRegistry';
import { JobRunner, PipelineMap } from '../src/jobs/JobRunner';
import { JobQueue } from '../src/queue/JobQueue';
import { MediaPipeline, PipelineContext, PipelineResult } from '../src/jobs/pipelines/types';
import { FileManager } from '../src/utils/FileManager';
import { CancellationRequestedError } from '../src/utils/errors';
import { DownloadKind, JobState } from '../src/types';

class FakePipeline implements MediaPipeline {
  readonly name = 'fake';
  constructor(private readonly body: (ctx: PipelineContext) => Promise<PipelineResult>) {}

  expectedPasses(): number {
    return 1;
  }

  outputExtensions(): string[] {
    return ['.mp4', '.mp3'];
  }

  run(ctx: PipelineContext): Promise<PipelineResult> {
    return this.body(ctx);
  }
}

function pipelines(pipeline: MediaPipeline): PipelineMap {
  return { video: pipeline, audio: pipeline, thumbnail: pipeline };
}

describe('JobRunner', () => {
  let root: string;
  let files: FileManager;
  let registry: JobRegistry;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'runner-test-'));
    files = new FileManager(root);
    await files.initialize();
    registry = new JobRegistry({ retentionMs: 60000 });
  });

  afterEach(async () => {
    registry.shutdown();
    await fs.rm(root, { recursive: true, force: true });
  });

  function createJob(kind: DownloadKind = 'video'): string {
    return registry.create({
      url: 'https://www.youtube.com/watch?v=abc_DEF-123',
      media_kind: kind,
      selected_format_id: '',
    });
  }

  it('should complete a job with the reported output file', async () => {
    const runner = new JobRunner(
      registry,
      files,
      pipelines(
        new FakePipeline(async ({ jobDir, emit }) => {
          emit({ type: 'progress', percent: 50 });
          const outputPath = path.join(jobDir, 'Title [abc_DEF-123].mp4');
          await fs.writeFile(outputPath, 'video');
          return { outputPath };
        }),
      ),
      { progressIntervalMs: 0 },
    );

    const id = createJob();
    await runner.run(id);

    const job = registry.getStatus(id);
    expect(job?.state).toBe(JobState.COMPLETED);
    expect(job?.progress_percent).toBe(100);
    expect(job?.filename).toBe('Title [abc_DEF-123].mp4');
    expect(job?.mime_type).toBe('video/mp4');
    expect(job?.output_path).toBe(path.join(root, id, 'Title [abc_DEF-123].mp4'));
    expect(job?.started_at).toBeInstanceOf(Date);
  });

  it('should pass through downloading before completing', async () => {
    const states: JobState[] = [];
    registry.on('job:updated', (event: { state: JobState }) => states.push(event.state));

    const runner = new JobRunner(
      registry,
      files,
      pipelines(
        new FakePipeline(async ({ jobDir, emit }) => {
          emit({ type: 'stage', name: 'ExtractAudio' });
          const outputPath = path.join(jobDir, 'a.mp3');
          await fs.writeFile(outputPath, 'audio');
          return { outputPath };
        }),
      ),
      { progressIntervalMs: 0 },
    );

    const id = createJob('audio');
    await runner.run(id);

    expect(states).toEqual([JobState.DOWNLOADING, JobState.PROCESSING, JobState.COMPLETED]);
    expect(registry.getStatus(id)?.mime_type).toBe('audio/mpeg');
  });

  it('should scan the job directory when the reported path is missing', async () => {
    const runner = new JobRunner(
      registry,
      files,
      pipelines(
        new FakePipeline(async ({ jobDir }) => {
          await fs.writeFile(path.join(jobDir, 'merged.mp4'), 'video');
          return { outputPath: path.join(jobDir, 'gone.f137.mp4') };
        }),
      ),
      { progressIntervalMs: 0 },
    );

    const id = createJob();
    await runner.run(id);

    expect(registry.getStatus(id)?.filename).toBe('merged.mp4');
  });

  it('should not accept a reported path outside the job directory', async () => {
    const outside = path.join(root, 'outside.mp4');
    await fs.writeFile(outside, 'x');
    const runner = new JobRunner(
      registry,
      files,
      pipelines(new FakePipeline(async () => ({ outputPath: outside }))),
      { progressIntervalMs: 0 },
    );

    const id = createJob();
    await runner.run(id);

    const job = registry.getStatus(id);
    expect(job?.state).toBe(JobState.FAILED);
    expect(job?.error).toBe('Download finished but no output file was found');
  });

  it('should fail with a sanitized message and remove the job directory', async () => {
    const runner = new JobRunner(
      registry,
      files,
      pipelines(
        new FakePipeline(async ({ jobDir }) => {
          await fs.writeFile(path.join(jobDir, 'partial.mp4.part'), 'x');
          throw new Error(`WARNING: retrying\nERROR: unable to write ${jobDir}/partial.mp4`);
        }),
      ),
      { progressIntervalMs: 0 },
    );

    const id = createJob();
    await runner.run(id);

    const job = registry.getStatus(id);
    expect(job?.state).toBe(JobState.FAILED);
    expect(job?.error).toBe('ERROR: unable to write partial.mp4');
    expect(await files.fileExists(path.join(root, id))).toBe(false);
  });

  it('should end canceled and clean up when the job is aborted mid-run', async () => {
    let started: () => void = () => undefined;
    const running = new Promise<void>((resolve) => {
      started = resolve;
    });

    const runner = new JobRunner(
      registry,
      files,
      pipelines(
        new FakePipeline(({ jobDir, signal }) =>
          new Promise<PipelineResult>((_resolve, reject) => {
            fs.writeFile(path.join(jobDir, 'partial.part'), 'x').then(started, reject);
            signal.addEventListener('abort', () => reject(new CancellationRequestedError()));
          }),
        ),
      ),
      { progressIntervalMs: 0 },
    );

    const id = createJob();
    const done = runner.run(id);
    await running;
    expect(registry.getStatus(id)?.state).toBe(JobState.DOWNLOADING);

    registry.cancel(id);
    await done;

    expect(registry.getStatus(id)?.state).toBe(JobState.CANCELED);
    expect(await files.fileExists(path.join(root, id))).toBe(false);
  });

  it('should let aborted jobs clean up before the queue drains on shutdown', async () => {
    let started: () => void = () => undefined;
    const running = new Promise<void>((resolve) => {
      started = resolve;
    });

    const runner = new JobRunner(
      registry,
      files,
      pipelines(
        new FakePipeline(({ jobDir, signal }) =>
          new Promise<PipelineResult>((_resolve, reject) => {
            fs.writeFile(path.join(jobDir, 'partial.part'), 'x').then(started, reject);
            signal.addEventListener('abort', () => reject(new CancellationRequestedError()));
          }),
        ),
      ),
      { progressIntervalMs: 0 },
    );
    const queue = new JobQueue(1);
    registry.setDispatcher((jobId) => queue.enqueue(jobId));
    queue.setProcessor((jobId) => runner.run(jobId));

    const id = createJob();
    await running;

    registry.shutdown();
    await expect(queue.drain(1000)).resolves.toBe(true);

    expect(registry.getStatus(id)?.state).toBe(JobState.CANCELED);
    expect(await files.fileExists(path.join(root, id))).toBe(false);
  });

  it('should treat a pipeline that ignores the abort as canceled', async () => {
    const runner = new JobRunner(
      registry,
      files,
      pipelines(
        new FakePipeline(async ({ jobDir }) => {
          registry.cancel(id);
          const outputPath = path.join(jobDir, 'a.mp4');
          await fs.writeFile(outputPath, 'x');
          return { outputPath };
        }),
      ),
      { progressIntervalMs: 0 },
    );

    const id = createJob();
    await runner.run(id);

    expect(registry.getStatus(id)?.state).toBe(JobState.CANCELED);
  });

  it('should skip jobs canceled while queued', async () => {
    const body = jest.fn(async (): Promise<PipelineResult> => ({}));
    const runner = new JobRunner(registry, files, pipelines(new FakePipeline(body)), { progressIntervalMs: 0 });

    const id = createJob();
    registry.cancel(id);
    await runner.run(id);

    expect(body).not.toHaveBeenCalled();
    expect(registry.getStatus(id)?.state).toBe(JobState.CANCELED);
  });
});
