'use client';

import { motion } from 'framer-motion';
import { Activity } from 'lucide-react';
import {
  cn,
  formatPulseScore,
  formatRelativeTime,
  getPulseColor,
  getPulseGlow,
  getPulseStatus,
} from '@/lib/utils';
import { roundPulseScore } from '@/lib/pulse';

interface PulseCardProps {
  score: number;
  updatedAt?: string | null;
  animated?: boolean;
  className?: string;
}

export function PulseCard({ score: rawScore, updatedAt, animated = true, className }: PulseCardProps) {
  const score = roundPulseScore(rawScore);
  const color = getPulseColor(score);
  const status = getPulseStatus(score);

  return (
    <section
      aria-label="Sector pulse"
      className={cn('rounded-xl border bg-card p-6 text-center', className)}
      style={{ borderColor: color, boxShadow: getPulseGlow(score) }}
    >
      <div className="flex items-center justify-center gap-2 text-sm text-muted-foreground">
        <Activity className="w-4 h-4" />
        <span>Sentiment Index</span>
      </div>

      <motion.div
        data-testid="pulse-score"
        className="mt-3 text-6xl font-semibold tabular-nums leading-none"
        style={{ color }}
        key={animated ? score : undefined}
        initial={animated ? { scale: 0.9, opacity: 0 } : undefined}
        animate={animated ? { scale: 1, opacity: 1 } : undefined}
      >
        {formatPulseScore(score)}
      </motion.div>

      <div className="mt-2 text-xl font-medium" style={{ color }}>
        {status}
      </div>

      {updatedAt && (
        <p className="mt-4 text-xs text-muted-foreground">
          Updated {formatRelativeTime(updatedAt)}
        </p>
      )}
    </section>
  );
}
