/**
 * Interactive review screen for devstrip
 *
 * Scans on mount, lists the plan largest first and lets the user narrow
 * the selection before anything is deleted. Deletion only ever runs after
 * the confirmation dialog, and never in dry-run mode.
 */

import React, { useCallback, useEffect, useMemo, useRef, useState } from 'react';
import { Box, Text, useApp, useInput, useStdout } from 'ink';
import { ConfirmDialog, Footer, Header, Help, List, ProgressBar } from './components/index.js';
import { deleteCandidates, generateDeletionPreview } from './deletion.js';
import { errorMessage } from './errors.js';
import { scanAndPlan } from './plan.js';
import type {
  CategoryGroup,
  DeleteOptions,
  DeletionResult,
  ScanConfig,
  ScanProgress,
  ScanResult,
  SizedCandidate,
} from './types.js';
import {
  availableGroups,
  calculateStatistics,
  filterByGroup,
  formatBytes,
  invertSelection,
  selectAll,
  sumBytes,
  toggleSelection,
} from './utils.js';

type Phase = 'scanning' | 'review' | 'confirm' | 'deleting' | 'done' | 'failed';

interface AppProps {
  config: ScanConfig;
  dryRun?: boolean;
  deleteOptions?: DeleteOptions;
  /** Reference time for ages shown in the list */
  now?: Date;
  /** Scan implementation (replaced in tests) */
  scan?: typeof scanAndPlan;
  /** Deletion implementation (replaced in tests) */
  remove?: typeof deleteCandidates;
  /**
   * Called once when the screen exits, with the deletion result if any
   * and the error message when the scan or deletion failed
   */
  onExit?: (result: DeletionResult | undefined, failure?: string) => void;
}

const EMPTY_PROGRESS: ScanProgress = { directoriesScanned: 0, candidatesFound: 0, candidatesSized: 0 };

export const App: React.FC<AppProps> = ({
  config,
  dryRun = false,
  deleteOptions,
  now,
  scan = scanAndPlan,
  remove = deleteCandidates,
  onExit,
}) => {
  const { stdout } = useStdout();
  const { exit } = useApp();
  const controller = useRef<AbortController | undefined>(undefined);

  const [phase, setPhase] = useState<Phase>('scanning');
  const [progress, setProgress] = useState<ScanProgress>(EMPTY_PROGRESS);
  const [scanResult, setScanResult] = useState<ScanResult | undefined>();
  const [items, setItems] = useState<readonly SizedCandidate[]>([]);
  const [selected, setSelected] = useState<ReadonlySet<string>>(new Set());
  const [focusedIndex, setFocusedIndex] = useState(0);
  const [groupFilter, setGroupFilter] = useState<CategoryGroup | undefined>();
  const [showHelp, setShowHelp] = useState(false);
  const [deleteProgress, setDeleteProgress] = useState({ current: 0, total: 0, label: '' });
  const [deletion, setDeletion] = useState<DeletionResult | undefined>();
  const [message, setMessage] = useState<string | undefined>();

  const visibleItems = useMemo(() => filterByGroup(items, groupFilter), [items, groupFilter]);
  const statistics = useMemo(() => calculateStatistics(items, selected), [items, selected]);
  const selectedItems = useMemo(
    () => items.filter(item => selected.has(item.path)),
    [items, selected],
  );

  // Reserve space for header, footer and the two-line list entries
  const visibleListCount = Math.max(3, Math.floor(((stdout.rows ?? 24) - 12) / 2));

  const quit = useCallback((result: DeletionResult | undefined, failure?: string) => {
    onExit?.(result, failure);
    exit();
  }, [exit, onExit]);

  // ============================================
  // Effects
  // ============================================

  useEffect(() => {
    const abort = new AbortController();
    controller.current = abort;

    void scan(config, {
      now,
      signal: abort.signal,
      onProgress: setProgress,
    }).then(
      (result) => {
        if (abort.signal.aborted) return;
        setScanResult(result);
        setItems(result.plan.candidates);
        setSelected(new Set(result.plan.candidates.map(candidate => candidate.path)));
        setPhase('review');
      },
      (error: unknown) => {
        if (abort.signal.aborted) return;
        setMessage(errorMessage(error));
        setPhase('failed');
      },
    );

    return () => abort.abort();
  }, [config, now, scan]);

  // ============================================
  // Actions
  // ============================================

  const handleConfirmDelete = useCallback(async () => {
    const approved = selectedItems;
    setPhase('deleting');
    setDeleteProgress({ current: 0, total: approved.length, label: '' });

    try {
      const result = await remove(approved, deleteOptions, (current, total, label) => {
        setDeleteProgress({ current, total, label });
      });
      const removed = new Set(
        result.details.filter(detail => detail.success).map(detail => detail.candidate.path),
      );
      setItems(prev => prev.filter(item => !removed.has(item.path)));
      setSelected(prev => new Set([...prev].filter(path => !removed.has(path))));
      setDeletion(result);
      setPhase('done');
    } catch (error) {
      setMessage(errorMessage(error));
      setPhase('failed');
    }
  }, [deleteOptions, remove, selectedItems]);

  // ============================================
  // Keyboard Handlers
  // ============================================

  useInput((input, key) => {
    if (phase === 'scanning') {
      if (input === 'q' || key.escape) {
        controller.current?.abort();
        quit(undefined);
      }
      return;
    }

    if (phase === 'done' || phase === 'failed') {
      if (input === 'q' || key.escape || key.return) {
        quit(deletion, phase === 'failed' ? message ?? 'Unknown error' : undefined);
      }
      return;
    }

    if (phase !== 'review' || showHelp) return;

    if (key.upArrow || input === 'k') {
      setFocusedIndex(prev => Math.max(0, prev - 1));
    } else if (key.downArrow || input === 'j') {
      setFocusedIndex(prev => Math.max(0, Math.min(visibleItems.length - 1, prev + 1)));
    } else if (input === ' ' || key.return) {
      const item = visibleItems[focusedIndex];
      if (item) setSelected(prev => toggleSelection(prev, item.path));
    } else if (input === 'a') {
      setSelected(prev => selectAll(prev, visibleItems, true));
    } else if (input === 'n') {
      setSelected(prev => selectAll(prev, visibleItems, false));
    } else if (input === 'i') {
      setSelected(prev => invertSelection(prev, visibleItems));
    } else if (input === 'c') {
      const groups = availableGroups(items);
      const next = groupFilter === undefined ? 0 : groups.indexOf(groupFilter) + 1;
      setGroupFilter(groups[next]);
      setFocusedIndex(0);
    } else if (input === 'd') {
      if (selectedItems.length > 0) setPhase('confirm');
    } else if (input === '?') {
      setShowHelp(true);
    } else if (input === 'q' || key.escape) {
      quit(undefined);
    }
  });

  // ============================================
  // Render
  // ============================================

  const header = (
    <Header
      statistics={statistics}
      isScanning={phase === 'scanning'}
      progress={progress}
      dryRun={dryRun}
    />
  );

  if (showHelp) {
    return (
      <Box flexDirection="column">
        {header}
        <Help onClose={() => setShowHelp(false)} />
      </Box>
    );
  }

  if (phase === 'confirm') {
    if (dryRun) {
      return (
        <Box flexDirection="column">
          {header}
          <ConfirmDialog
            message={`Dry run: would delete ${selectedItems.length} directories (${formatBytes(sumBytes(selectedItems))}). Nothing will be removed.`}
            onConfirm={() => setPhase('review')}
            onCancel={() => setPhase('review')}
          />
        </Box>
      );
    }
    return (
      <Box flexDirection="column">
        {header}
        <ConfirmDialog
          message={generateDeletionPreview(selectedItems)}
          onConfirm={() => void handleConfirmDelete()}
          onCancel={() => setPhase('review')}
        />
      </Box>
    );
  }

  if (phase === 'deleting') {
    return (
      <Box flexDirection="column">
        {header}
        <ProgressBar
          current={deleteProgress.current}
          total={deleteProgress.total}
          label={deleteProgress.label}
          operation="Deleting"
        />
      </Box>
    );
  }

  if (phase === 'done' && deletion) {
    return (
      <Box flexDirection="column">
        {header}
        <Box flexDirection="column" padding={1}>
          <Text color="green">
            Deleted {deletion.successful}/{deletion.totalAttempted} directories, freed {deletion.formattedBytesFreed}
          </Text>
          {deletion.details.filter(detail => !detail.success).map(detail => (
            <Text key={detail.candidate.path} color="red">
              ✗ {detail.candidate.path}: {detail.error}
            </Text>
          ))}
          <Text color="gray">Press q to quit.</Text>
        </Box>
      </Box>
    );
  }

  if (phase === 'failed') {
    return (
      <Box flexDirection="column">
        {header}
        <Box padding={1}>
          <Text color="red">Error: {message}</Text>
        </Box>
      </Box>
    );
  }

  const warnings = scanResult?.warnings.length ?? 0;

  return (
    <Box flexDirection="column">
      {header}

      {warnings > 0 && (
        <Box paddingX={1}>
          <Text color="yellow">{warnings} unreadable paths skipped</Text>
        </Box>
      )}

      <Box flexGrow={1} overflow="hidden">
        {phase === 'scanning' ? (
          <Box padding={1}>
            <Text color="gray">{progress.currentPath ?? 'Starting scan...'}</Text>
          </Box>
        ) : (
          <List
            items={visibleItems}
            selected={selected}
            focusedIndex={focusedIndex}
            visibleCount={visibleListCount}
            now={now}
          />
        )}
      </Box>

      <Footer groupFilter={groupFilter} />
    </Box>
  );
};

export default App;
