import { JobRequest } from '../../types';
import { PipelineEvent } from '../ProgressParser';

export interface PipelineContext {
    jobId: string;
    request: Readonly<JobRequest>;
    jobDir: string;
    signal: AbortSignal;
    emit: (event: PipelineEvent) => void;
}

export interface PipelineResult {
    // Where the pipeline believes the output landed; verified by the runner
    outputPath?: string;
}

/**
 * A strategy that turns a job request into one file inside the job directory
 */
export interface MediaPipeline {
    readonly name: string;

    /** Number of transfer passes the request is expected to take */
    expectedPasses(request: Readonly<JobRequest>): number;

    /** Extensions to scan for when the reported output path is missing */
    outputExtensions(request: Readonly<JobRequest>): string[];

    run(context: PipelineContext): Promise<PipelineResult>;
}
