/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useApp } from 'ink';
import type { ClassifiedRecord, PipelineState, RunSummary, RunWarning } from '../core/index.js';
import type { FilterObserver } from '../types/observer.js';
import { runLogFilter, type LogFilterOptions } from '../runner/index.js';

const SAMPLE_LIMIT = 10;
const WARNING_LIMIT = 5;

interface Stats {
  match: number;
  mismatch: number;
  neutral: number;
}

interface Progress {
  classifiedFiles: number;
  totalFiles: number;
}

interface AppState {
  pipelineState: PipelineState;
  stats: Stats;
  progress: Progress;
  warnings: RunWarning[];
  samples: ClassifiedRecord[];
  lastEvent: string;
}

const initialState: AppState = {
  pipelineState: 'Idle',
  stats: { match: 0, mismatch: 0, neutral: 0 },
  progress: { classifiedFiles: 0, totalFiles: 0 },
  warnings: [],
  samples: [],
  lastEvent: 'Initializing...',
};

export interface FilterAppProps {
  options: Omit<LogFilterOptions, 'observer'>;
  onComplete?(summary: RunSummary): void;
}

export const FilterApp: React.FC<FilterAppProps> = ({ options, onComplete }) => {
  const [state, setState] = useState<AppState>(initialState);
  const [result, setResult] = useState<RunSummary | undefined>();
  const [error, setError] = useState<string | undefined>();
  const { exit } = useApp();

  useEffect(() => {
    let cancelled = false;

    const observer: FilterObserver = {
      onStateChange: (event) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          pipelineState: event.to,
          lastEvent: event.message ? `[${event.to}] ${event.message}` : `[${event.to}]`,
        }));
      },

      onEnumerated: (info) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          progress: { ...prev.progress, totalFiles: info.files },
          lastEvent: `Found ${info.files} log file(s), ${info.warnings} skipped`,
        }));
      },

      onFileClassified: (info) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          stats: {
            match: prev.stats.match + info.summary.match,
            mismatch: prev.stats.mismatch + info.summary.mismatch,
            neutral: prev.stats.neutral + info.summary.neutral,
          },
          progress: { classifiedFiles: prev.progress.classifiedFiles + 1, totalFiles: info.total },
          lastEvent: `Classified ${info.summary.source} (${info.summary.records} lines)`,
        }));
      },

      onRecords: (records) => {
        if (cancelled) return;
        setState((prev) => {
          if (prev.samples.length >= SAMPLE_LIMIT) return prev;
          const picked = records.filter((record) => record.category !== 'neutral');
          return { ...prev, samples: [...prev.samples, ...picked].slice(0, SAMPLE_LIMIT) };
        });
      },

      onWarning: (warning) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          warnings: [...prev.warnings, warning],
          lastEvent: `[warning] ${warning.source}: ${warning.message}`,
        }));
      },
    };

    runLogFilter({ ...options, observer })
      .then((summary) => {
        if (cancelled) return;
        setResult(summary);
        onComplete?.(summary);
      })
      .catch((err: unknown) => {
        if (cancelled) return;
        setError(err instanceof Error ? err.message : String(err));
      });

    return () => {
      cancelled = true;
    };
  }, [options, onComplete]);

  useEffect(() => {
    if (result || error) {
      const timer = setTimeout(() => exit(error ? new Error(error) : undefined), 200);
      return () => clearTimeout(timer);
    }
    return undefined;
  }, [result, error, exit]);

  const { classifiedFiles, totalFiles } = state.progress;
  const progressPercent = totalFiles === 0 ? 0 : Math.round((classifiedFiles / totalFiles) * 100);

  return (
    <Box flexDirection="column">
      <Box borderStyle="round" borderColor="cyan" paddingX={1}>
        <Text bold color="cyanBright">
          CAN LOG FILTER
        </Text>
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor="gray" flexDirection="column" paddingX={1} paddingY={0}>
        <Box>
          <Text dimColor>State: </Text>
          <Text color="cyan">{state.pipelineState}</Text>
          <Text dimColor> | Files: </Text>
          <Text>
            {classifiedFiles}/{totalFiles || '?'}
          </Text>
        </Box>
        <Box>
          <Text dimColor>Match: </Text>
          <Text color="greenBright">{state.stats.match}</Text>
          <Text dimColor> | Mismatch: </Text>
          <Text color="red">{state.stats.mismatch}</Text>
          <Text dimColor> | Neutral: </Text>
          <Text>{state.stats.neutral}</Text>
          <Text dimColor> | Warnings: </Text>
          <Text color="yellow">{state.warnings.length}</Text>
        </Box>
        <Box>
          <Text dimColor>Progress: </Text>
          <Text color="greenBright">{renderBar(progressPercent, 30)}</Text>
          <Text color="white"> {progressPercent}%</Text>
        </Box>
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor="magenta" paddingX={1} paddingY={0}>
        <Text bold color="magenta">
          Activity:{' '}
        </Text>
        <Text>{state.lastEvent}</Text>
      </Box>

      {state.warnings.length > 0 && (
        <Box marginTop={1} borderStyle="single" borderColor="yellow" flexDirection="column" paddingX={1} paddingY={0}>
          {state.warnings.slice(0, WARNING_LIMIT).map((warning) => (
            <Text key={`${warning.code}:${warning.source}`} color="yellow">
              {warning.code} {warning.source}: {warning.message}
            </Text>
          ))}
          {state.warnings.length > WARNING_LIMIT && (
            <Text dimColor>...and {state.warnings.length - WARNING_LIMIT} more</Text>
          )}
        </Box>
      )}

      {result?.status === 'done' && (
        <Box marginTop={1} borderStyle="double" borderColor="greenBright" flexDirection="column" paddingX={1} paddingY={0}>
          <Text bold color="greenBright">
            ✓ COMPLETE
          </Text>
          <Text>
            Classified {result.totals.records} lines in {result.files.length} files | Match {result.totals.match} |
            Mismatch {result.totals.mismatch}
          </Text>
          <Text dimColor>Text report: {result.artifacts?.textPath}</Text>
          <Text dimColor>HTML report: {result.artifacts?.htmlPath}</Text>
          {state.samples.map((record) => (
            <Text key={`${record.source}:${record.lineNumber}`} color={record.category === 'match' ? 'green' : 'red'}>
              {record.source} - Line {record.lineNumber}: {record.raw}
            </Text>
          ))}
        </Box>
      )}

      {result?.status === 'failed' && (
        <Box marginTop={1} borderStyle="bold" borderColor="red" paddingX={1} paddingY={0}>
          <Text color="redBright">
            FAILED ({result.fatal?.code}): {result.fatal?.message}
          </Text>
        </Box>
      )}

      {error && (
        <Box marginTop={1} borderStyle="bold" borderColor="red" paddingX={1} paddingY={0}>
          <Text color="redBright">ERROR: {error}</Text>
        </Box>
      )}
    </Box>
  );
};

function renderBar(percent: number, width: number): string {
  const filled = Math.round((percent / 100) * width);
  const empty = width - filled;
  return '█'.repeat(filled) + '░'.repeat(empty);
}
