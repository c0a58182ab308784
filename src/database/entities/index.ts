export * from './podcast.entity';
export * from './transcript.entity';
export * from './key-point.entity';
export * from './clip.entity';
