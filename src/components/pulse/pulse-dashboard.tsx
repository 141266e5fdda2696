'use client';

import { Landmark, RefreshCw } from 'lucide-react';
import { useMarketCapWeights, useSectorFeed } from '@/hooks/use-sector-feed';
import { usePulse } from '@/hooks/use-pulse';
import { cn } from '@/lib/utils';
import { PulseCard } from './pulse-card';
import { SectorWeightEditor } from './sector-weight-editor';

interface PulseDashboardProps {
  refetchIntervalMs?: number;
  className?: string;
}

export function PulseDashboard({ refetchIntervalMs, className }: PulseDashboardProps) {
  const feed = useSectorFeed({ refetchIntervalMs });
  const marketCaps = useMarketCapWeights();
  const {
    pulseScore,
    weights,
    scores,
    scoresUpdatedAt,
    error,
    editWeight,
    resetWeights,
    clearError,
  } = usePulse();

  return (
    <div className={cn('grid gap-6 md:grid-cols-[1fr_2fr]', className)}>
      <div className="space-y-4">
        <PulseCard score={pulseScore} updatedAt={scoresUpdatedAt} />

        {feed.isLoading && (
          <p className="text-sm text-muted-foreground">Loading sector scores...</p>
        )}

        {feed.isError && (
          <div role="status" className="space-y-2 text-sm text-red-500">
            <p>Unable to load sector scores: {feed.error?.message}</p>
            <button
              type="button"
              onClick={() => void feed.refetch()}
              className="inline-flex items-center gap-1.5 text-xs underline"
            >
              <RefreshCw className="w-3.5 h-3.5" />
              Retry
            </button>
          </div>
        )}

        <button
          type="button"
          onClick={() => marketCaps.mutate()}
          disabled={marketCaps.isPending}
          className="inline-flex items-center gap-1.5 text-xs text-muted-foreground hover:text-foreground disabled:opacity-50"
        >
          <Landmark className="w-3.5 h-3.5" />
          Use market-cap weights
        </button>
        {marketCaps.isError && (
          <p className="text-xs text-red-500">
            Unable to load market caps: {marketCaps.error.message}
          </p>
        )}
      </div>

      <SectorWeightEditor
        weights={weights}
        scores={scores}
        onApply={editWeight}
        onReset={resetWeights}
        error={error}
        onDismissError={clearError}
      />
    </div>
  );
}
