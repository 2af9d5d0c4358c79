import { Box, Text, useApp, useInput } from 'ink';
import { useEffect, useRef, useState } from 'react';

import { errorMessage } from '@/assets/errors';
import { formatMegabytes } from '@/assets/report';
import type {
  PackageRunEntry,
  PackageRunStatus,
  RunSummary,
  WorkflowEvent,
  WorkflowObserver,
} from '@/assets/types';

type Stage = 'running' | 'summary' | 'fatal';

type ActivePackage = {
  packageName: string;
  index: number;
  total: number;
};

export type RunApplicationProps = {
  title: string;
  projectPath: string;
  logPath: string;
  run: (notify: WorkflowObserver) => Promise<number>;
  onComplete: (code: number) => void;
};

const SPINNER_FRAMES = ['-', '\\', '|', '/'];
const VISIBLE_ENTRIES = 12;

const COLORS = {
  amber: '#f2a541',
  cyan: '#61dafb',
  steel: '#8ea0b2',
  muted: '#6b7280',
  danger: '#ff6b6b',
  success: '#6ee7b7',
};

const TITLE_LINES = [
  ' ____   _    ____ _  __     ______   ___   _  ____',
  '|  _ \\ / \\  / ___| |/ /    / ___\\ \\ / / \\ | |/ ___|',
  '| |_) / _ \\| |   | . /____ \\___ \\\\ V /|  \\| | |',
  '|  __/ ___ \\ |___| . \\_____|___) || | | |\\  | |___',
  '|_| /_/   \\_\\____|_|\\_\\    |____/ |_| |_| \\_|\\____|',
];

const statusColor = (status: PackageRunStatus): string => {
  switch (status) {
    case 'failed':
      return COLORS.danger;
    case 'skipped':
    case 'planned':
      return COLORS.muted;
    case 'cached':
    case 'already-synced':
      return COLORS.cyan;
    default:
      return COLORS.success;
  }
};

export const RunApplication = ({ title, projectPath, logPath, run, onComplete }: RunApplicationProps) => {
  const { exit } = useApp();

  const [stage, setStage] = useState<Stage>('running');
  const [spinnerTick, setSpinnerTick] = useState(0);
  const [stageMessage, setStageMessage] = useState(`Starting ${title}...`);
  const [activePackage, setActivePackage] = useState<ActivePackage | null>(null);
  const [entries, setEntries] = useState<PackageRunEntry[]>([]);
  const [summary, setSummary] = useState<RunSummary | null>(null);
  const [fatalError, setFatalError] = useState<string | null>(null);

  const exitCodeRef = useRef(0);
  const finalizedRef = useRef(false);

  const frameWidth = Math.max(72, Math.min((process.stdout.columns || 118) - 2, 118));

  useEffect(() => {
    if (stage !== 'running') {
      return;
    }

    const timer = setInterval(() => {
      setSpinnerTick((value) => (value + 1) % SPINNER_FRAMES.length);
    }, 110);

    return () => clearInterval(timer);
  }, [stage]);

  const finalize = (code: number) => {
    if (finalizedRef.current) {
      return;
    }
    finalizedRef.current = true;

    onComplete(code);
    exit();
  };

  useEffect(() => {
    let cancelled = false;

    const observe = (event: WorkflowEvent) => {
      if (cancelled) {
        return;
      }

      switch (event.type) {
        case 'stage':
          setStageMessage(event.message);
          break;
        case 'package-start':
          setActivePackage({
            packageName: event.packageName,
            index: event.index,
            total: event.total,
          });
          break;
        case 'package-done':
          setActivePackage(null);
          setEntries((current) => [...current, event.entry]);
          break;
        case 'summary':
          setSummary(event.summary);
          break;
      }
    };

    const execute = async () => {
      try {
        const code = await run(observe);
        if (cancelled) {
          return;
        }
        exitCodeRef.current = code;
        setStage('summary');
      } catch (error) {
        if (cancelled) {
          return;
        }
        exitCodeRef.current = 1;
        setFatalError(errorMessage(error));
        setStage('fatal');
      }
    };

    void execute();

    return () => {
      cancelled = true;
    };
  }, [run]);

  useInput((input, key) => {
    if (key.ctrl && input === 'c') {
      finalize(130);
      return;
    }

    if ((stage === 'summary' || stage === 'fatal') && (key.return || input === 'q')) {
      finalize(exitCodeRef.current);
    }
  });

  const renderHeader = () => (
    <Box borderStyle="round" borderColor={COLORS.amber} flexDirection="column" paddingX={1}>
      {TITLE_LINES.map((line) => (
        <Text key={line} color={COLORS.amber} bold>
          {line}
        </Text>
      ))}
      <Text color={COLORS.cyan}>PACKAGE OPERATIONS BOARD :: {title.toLowerCase()}</Text>
      <Text color={COLORS.steel}>project: {projectPath}</Text>
    </Box>
  );

  const renderProgress = () => (
    <Box marginTop={1} borderStyle="round" borderColor={COLORS.cyan} paddingX={1} flexDirection="column">
      <Text color={COLORS.cyan}>
        [{SPINNER_FRAMES[spinnerTick]}] {stageMessage}
      </Text>
      {activePackage ? (
        <Text color={COLORS.amber}>
          [{activePackage.index}/{activePackage.total}] {activePackage.packageName}
        </Text>
      ) : null}
    </Box>
  );

  const renderEntries = () => {
    if (entries.length === 0) {
      return null;
    }

    const hidden = Math.max(0, entries.length - VISIBLE_ENTRIES);

    return (
      <Box marginTop={1} flexDirection="column" borderStyle="round" borderColor={COLORS.steel} paddingX={1}>
        <Text bold color={COLORS.cyan}>Packages</Text>
        {hidden > 0 && <Text color={COLORS.muted}>... {hidden} earlier</Text>}
        {entries.slice(hidden).map((entry, index) => (
          <Text key={`${entry.packageName}-${hidden + index}`} color={statusColor(entry.status)}>
            - {entry.status.toUpperCase()} {entry.packageName}
            {entry.sizeBytes !== undefined ? ` (${formatMegabytes(entry.sizeBytes)})` : ''}
            {entry.error ? ` :: ${entry.error}` : ''}
          </Text>
        ))}
      </Box>
    );
  };

  const renderSummary = () => (
    <Box marginTop={1} borderStyle="round" borderColor={COLORS.success} paddingX={1} flexDirection="column">
      <Text bold color={COLORS.success}>{summary?.title ?? title} Summary</Text>
      <Text color={COLORS.success}>success: {summary?.success ?? 0}</Text>
      <Text color={(summary?.failed ?? 0) > 0 ? COLORS.danger : COLORS.steel}>failed: {summary?.failed ?? 0}</Text>
      <Text color={COLORS.muted}>skipped: {summary?.skipped ?? 0}</Text>
      <Text color={COLORS.steel}>total: {summary?.total ?? 0}</Text>
      <Text color={COLORS.steel}>size: {formatMegabytes(summary?.totalSizeBytes ?? 0)}</Text>
      {summary?.reportPath ? <Text color={COLORS.steel}>report: {summary.reportPath}</Text> : null}
      {summary?.notes.map((note) => (
        <Text key={note} color={COLORS.muted}>
          note: {note}
        </Text>
      ))}
      <Text color={COLORS.muted}>Press enter to exit.</Text>
    </Box>
  );

  const renderFatal = () => (
    <Box marginTop={1} borderStyle="round" borderColor={COLORS.danger} paddingX={1} flexDirection="column">
      <Text bold color={COLORS.danger}>{title} failed</Text>
      <Text color={COLORS.steel}>{fatalError}</Text>
      <Text color={COLORS.muted}>Press enter to exit.</Text>
    </Box>
  );

  return (
    <Box flexDirection="column" width={frameWidth} paddingX={1}>
      {renderHeader()}
      {stage === 'running' && renderProgress()}
      {renderEntries()}
      {stage === 'summary' && renderSummary()}
      {stage === 'fatal' && renderFatal()}

      <Box marginTop={1} borderStyle="single" borderColor={COLORS.steel} paddingX={1}>
        <Text color={COLORS.muted}>
          keys :: {stage === 'running' ? 'ctrl+c abort' : 'enter exit  q quit'} :: log {logPath}
        </Text>
      </Box>
    </Box>
  );
};
