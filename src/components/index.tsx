/**
 * Ink components for the review screen
 *
 * Components follow the reactive pattern: props change -> re-render.
 *
 * Component hierarchy:
 * App
 * ├── Header (title, totals, scan progress)
 * ├── List (scrollable plan)
 * │   └── ListItem (one candidate)
 * ├── Footer (keyboard shortcuts, active filter)
 * └── Help / ConfirmDialog / ProgressBar (overlays)
 */

import React from 'react';
import { Box, Text, useInput } from 'ink';
import type { CategoryGroup, PlanStatistics, ScanProgress, SizedCandidate } from '../types.js';
import {
  formatBytes,
  formatRelativeTime,
  getSizeCategory,
  getSizeColor,
  truncateMiddle,
} from '../utils.js';

// ============================================
// Header Component
// ============================================

interface HeaderProps {
  statistics: PlanStatistics;
  isScanning: boolean;
  progress?: ScanProgress;
  dryRun?: boolean;
}

/**
 * Header displays the title and plan totals.
 * While scanning it shows live counters instead.
 */
export const Header: React.FC<HeaderProps> = ({ statistics, isScanning, progress, dryRun }) => {
  return (
    <Box flexDirection="column" borderStyle="single" padding={1}>
      <Box justifyContent="space-between">
        <Text bold color="cyan">devstrip{dryRun ? ' (dry run)' : ''}</Text>
        {isScanning && progress && (
          <Text color="yellow">
            Scanning... {progress.directoriesScanned} dirs, {progress.candidatesSized}/{progress.candidatesFound} sized
          </Text>
        )}
      </Box>

      <Box justifyContent="space-between" marginTop={1}>
        <Text>
          <Text color="white">Candidates: </Text>
          <Text bold color="green">{statistics.totalCandidates}</Text>
        </Text>
        <Text>
          <Text color="white">Reclaimable: </Text>
          <Text bold color="yellow">{statistics.totalSizeFormatted}</Text>
        </Text>
        <Text>
          <Text color="white">Selected: </Text>
          <Text bold color="cyan">{statistics.selectedCount}</Text>
          <Text> ({statistics.selectedSizeFormatted})</Text>
        </Text>
      </Box>
    </Box>
  );
};

// ============================================
// List Item Component
// ============================================

interface ListItemProps {
  item: SizedCandidate;
  isSelected: boolean;
  isFocused: boolean;
  now?: Date;
}

/**
 * ListItem displays one candidate with its category, size and age.
 */
export const ListItem: React.FC<ListItemProps> = ({ item, isSelected, isFocused, now }) => {
  const sizeCategory = getSizeCategory(item.sizeBytes);
  const selectionIndicator = isSelected ? '[✓]' : '[ ]';
  const focusIndicator = isFocused ? '>' : ' ';

  return (
    <Box flexDirection="column">
      <Text>
        <Text color={isFocused ? 'cyan' : 'white'}>{focusIndicator}</Text>
        <Text color={isSelected ? 'green' : 'white'}>{selectionIndicator}</Text>
        <Text> </Text>
        <Text bold>{item.category.label.padEnd(16)}</Text>
        <Text color={getSizeColor(sizeCategory)} bold>{formatBytes(item.sizeBytes).padStart(9)}</Text>
        <Text>  </Text>
        <Text color="gray">[{formatRelativeTime(item.modifiedAt, now)}]</Text>
      </Text>
      <Text color="gray">      {truncateMiddle(item.path, 72)}</Text>
    </Box>
  );
};

// ============================================
// List Component
// ============================================

interface ListProps {
  items: readonly SizedCandidate[];
  selected: ReadonlySet<string>;
  focusedIndex: number;
  visibleCount: number;
  now?: Date;
}

/**
 * List displays a window of the plan around the focused entry.
 */
export const List: React.FC<ListProps> = ({ items, selected, focusedIndex, visibleCount, now }) => {
  const halfVisible = Math.floor(visibleCount / 2);
  let startIndex = Math.max(0, focusedIndex - halfVisible);
  const endIndex = Math.min(items.length, startIndex + visibleCount);

  // Adjust start if we're near the end
  if (endIndex - startIndex < visibleCount) {
    startIndex = Math.max(0, endIndex - visibleCount);
  }

  const visibleItems = items.slice(startIndex, endIndex);

  return (
    <Box flexDirection="column" flexGrow={1} overflow="hidden">
      {items.length === 0 ? (
        <Box padding={2}>
          <Text color="gray">Nothing to clean up. Press 'q' to quit.</Text>
        </Box>
      ) : (
        <>
          {startIndex > 0 && (
            <Text color="gray">↑ {startIndex} more...</Text>
          )}

          {visibleItems.map((item, index) => (
            <ListItem
              key={item.path}
              item={item}
              isSelected={selected.has(item.path)}
              isFocused={startIndex + index === focusedIndex}
              now={now}
            />
          ))}

          {endIndex < items.length && (
            <Text color="gray">↓ {items.length - endIndex} more...</Text>
          )}
        </>
      )}
    </Box>
  );
};

// ============================================
// Footer Component
// ============================================

interface FooterProps {
  groupFilter?: CategoryGroup;
}

/**
 * Footer displays keyboard shortcuts and the active category filter.
 */
export const Footer: React.FC<FooterProps> = ({ groupFilter }) => {
  return (
    <Box flexDirection="column" borderStyle="single" padding={1}>
      <Box justifyContent="space-between">
        <Text color="gray">
          [↑/↓] Navigate  [Space] Toggle  [d] Delete  [a] Select all  [n] None  [i] Invert
        </Text>
      </Box>
      <Box justifyContent="space-between">
        <Text color="gray">
          [c] Category ({groupFilter ?? 'all'})  [q] Quit  [?] Help
        </Text>
      </Box>
    </Box>
  );
};

// ============================================
// Help Overlay Component
// ============================================

interface HelpProps {
  onClose: () => void;
}

/**
 * Help displays keyboard shortcuts.
 */
export const Help: React.FC<HelpProps> = ({ onClose }) => {
  useInput((input, key) => {
    if (input === 'q' || input === '?' || key.escape) {
      onClose();
    }
  });

  return (
    <Box flexDirection="column" borderStyle="double" padding={2} width="80%">
      <Text bold color="cyan">devstrip - Keyboard Shortcuts</Text>
      <Box marginY={1}>
        <Text color="gray">Navigation</Text>
      </Box>
      <Text>  ↑/↓ or j/k     Navigate up/down</Text>
      <Text>  Space/Enter    Toggle selection</Text>

      <Box marginY={1}>
        <Text color="gray">Selection</Text>
      </Box>
      <Text>  a              Select all visible</Text>
      <Text>  n              Deselect all visible</Text>
      <Text>  i              Invert selection</Text>
      <Text>  c              Cycle category filter</Text>

      <Box marginY={1}>
        <Text color="gray">Actions</Text>
      </Box>
      <Text>  d              Delete selected</Text>
      <Text>  q / Esc        Quit (cancels a running scan)</Text>
      <Text>  ?              Toggle this help</Text>
    </Box>
  );
};

// ============================================
// Confirmation Dialog Component
// ============================================

interface ConfirmDialogProps {
  message: string;
  onConfirm: () => void;
  onCancel: () => void;
}

/**
 * ConfirmDialog asks before anything is removed. Only `y` confirms.
 */
export const ConfirmDialog: React.FC<ConfirmDialogProps> = ({ message, onConfirm, onCancel }) => {
  useInput((input, key) => {
    if (input === 'y' || input === 'Y') {
      onConfirm();
    } else if (input === 'n' || input === 'N' || key.escape) {
      onCancel();
    }
  });

  return (
    <Box flexDirection="column" borderStyle="double" borderColor="yellow" padding={2} width="80%">
      <Text color="yellow" bold>Confirmation Required</Text>
      <Box marginY={1}>
        <Text>{message}</Text>
      </Box>
      <Text color="gray">Proceed? (y/N): </Text>
    </Box>
  );
};

// ============================================
// Progress Bar Component
// ============================================

interface ProgressBarProps {
  current: number;
  total: number;
  label: string;
  operation: string;
}

/**
 * ProgressBar shows progress during deletion.
 */
export const ProgressBar: React.FC<ProgressBarProps> = ({ current, total, label, operation }) => {
  const percentage = total > 0 ? Math.round((current / total) * 100) : 0;
  const barWidth = 40;
  const filledWidth = Math.round((percentage / 100) * barWidth);

  return (
    <Box flexDirection="column" borderStyle="single" padding={1} width="80%">
      <Text bold>{operation}...</Text>
      <Box marginY={1}>
        <Text color="cyan">{'█'.repeat(filledWidth)}</Text>
        <Text color="gray">{'░'.repeat(barWidth - filledWidth)}</Text>
        <Text> {percentage}%</Text>
      </Box>
      <Text color="gray">{current}/{total}: {label}</Text>
    </Box>
  );
};
