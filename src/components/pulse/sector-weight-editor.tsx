'use client';

import { useEffect, useId, useMemo, useState } from 'react';
import { AlertCircle, Check, RotateCcw, X } from 'lucide-react';
import { DEFAULT_WEIGHT_BOUNDS } from '@/lib/constants';
import { sumWeights } from '@/lib/pulse';
import { cn, formatPulseScore, formatWeight, getPulseColor } from '@/lib/utils';
import type { SectorScores, SectorWeights } from '@/types/pulse';

interface SectorWeightEditorProps {
  weights: SectorWeights;
  scores?: SectorScores;
  onApply: (sector: string, value: number) => void;
  onReset: () => void;
  error?: string | null;
  onDismissError?: () => void;
  disabled?: boolean;
  className?: string;
}

function toDrafts(weights: SectorWeights): Record<string, string> {
  return Object.fromEntries(
    Object.entries(weights).map(([sector, weight]) => [sector, weight.toFixed(2)])
  );
}

export function SectorWeightEditor({
  weights,
  scores = {},
  onApply,
  onReset,
  error,
  onDismissError,
  disabled = false,
  className,
}: SectorWeightEditorProps) {
  const idPrefix = useId();
  const [drafts, setDrafts] = useState(() => toDrafts(weights));

  // Every applied edit rewrites all weights, so all drafts follow
  useEffect(() => {
    setDrafts(toDrafts(weights));
  }, [weights]);

  const sectors = useMemo(
    () => Object.keys(weights).sort((a, b) => a.localeCompare(b)),
    [weights]
  );
  const total = useMemo(() => sumWeights(weights), [weights]);

  const applyDraft = (sector: string) => {
    const draft = (drafts[sector] ?? '').trim();
    onApply(sector, draft === '' ? NaN : Number(draft));
  };

  return (
    <div className={cn('space-y-4', className)}>
      <div className="flex items-center justify-between">
        <h3 className="text-sm font-medium">Sector Weights</h3>
        <button
          type="button"
          onClick={onReset}
          disabled={disabled}
          className="inline-flex items-center gap-1.5 text-xs text-muted-foreground hover:text-foreground disabled:opacity-50"
        >
          <RotateCcw className="w-3.5 h-3.5" />
          Reset to equal weights
        </button>
      </div>

      {error && (
        <div
          role="alert"
          className="flex items-center gap-2 rounded-md border border-red-500/40 bg-red-500/10 px-3 py-2 text-sm text-red-500"
        >
          <AlertCircle className="w-4 h-4 shrink-0" />
          <span className="flex-1">{error}</span>
          {onDismissError && (
            <button type="button" onClick={onDismissError} aria-label="Dismiss error">
              <X className="w-4 h-4" />
            </button>
          )}
        </div>
      )}

      <ul className="divide-y divide-border">
        {sectors.map((sector, index) => {
          const inputId = `${idPrefix}-weight-${index}`;
          const score = scores[sector];

          return (
            <li key={sector} className="flex items-center gap-3 py-2">
              <label htmlFor={inputId} className="flex-1 text-sm">
                {sector}
              </label>

              {score !== undefined && (
                <span
                  className="w-12 text-right text-sm font-semibold tabular-nums"
                  style={{ color: getPulseColor(score) }}
                >
                  {formatPulseScore(score)}
                </span>
              )}

              <input
                id={inputId}
                type="number"
                inputMode="decimal"
                step="0.01"
                min={DEFAULT_WEIGHT_BOUNDS.minWeight}
                max={DEFAULT_WEIGHT_BOUNDS.maxWeight}
                value={drafts[sector] ?? ''}
                disabled={disabled}
                onChange={(e) =>
                  setDrafts((prev) => ({ ...prev, [sector]: e.target.value }))
                }
                onKeyDown={(e) => {
                  if (e.key === 'Enter') {
                    e.preventDefault();
                    applyDraft(sector);
                  }
                }}
                className="w-24 rounded-md border border-border bg-background px-2 py-1 text-right text-sm tabular-nums"
              />

              <button
                type="button"
                onClick={() => applyDraft(sector)}
                disabled={disabled}
                aria-label={`Apply weight for ${sector}`}
                className="inline-flex items-center gap-1 rounded-md bg-primary px-2 py-1 text-xs text-primary-foreground disabled:opacity-50"
              >
                <Check className="w-3.5 h-3.5" />
                Apply
              </button>
            </li>
          );
        })}
      </ul>

      <p className="text-right text-xs text-muted-foreground" data-testid="weight-total">
        Total: {formatWeight(total)}
      </p>
    </div>
  );
}
