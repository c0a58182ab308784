export const PIPELINE_QUEUE = 'podcast-pipeline';

export interface PipelineJobData {
  podcast_id: string;
  attempt_id: string;
}
