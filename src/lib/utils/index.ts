export { cn } from './cn';
export { PULSE_COLORS, getPulseStatus, getPulseColor, getPulseGlow } from './colors';
export {
  formatPulseScore,
  formatWeight,
  formatDate,
  formatRelativeTime,
} from './format';
