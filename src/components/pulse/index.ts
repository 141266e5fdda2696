export { PulseCard } from './pulse-card';
export { SectorWeightEditor } from './sector-weight-editor';
export { PulseDashboard } from './pulse-dashboard';
