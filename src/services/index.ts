export * from './snapshot-store.service';
export * from './follower-api.service';
export * from './merge.service';
export * from './chart.service';
export * from './tracker.runner';
