export const NATS_SERVICE = 'NATS_SERVICE';

export const EstimateSubjects = {
  analyze: 'estimates.analyze',
  resume: 'estimates.resume',
  health: 'estimates.health.check',
} as const;

export const EstimateEvents = {
  reported: 'estimates.reported',
} as const;
