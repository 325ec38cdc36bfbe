/**
 * useTerminalSize Hook
 *
 * Provides reactive terminal dimensions that update on resize, plus the
 * rows left for content once fixed chrome is subtracted.
 */

import { useState, useEffect } from "react";
import { useStdout } from "ink";

export interface TerminalSize {
  width: number;
  height: number;
  /** Rows left after `reservedLines`, never negative */
  contentHeight: number;
}

function measure(columns: number | undefined, rows: number | undefined, reservedLines: number): TerminalSize {
  const width = columns ?? 80;
  const height = rows ?? 24;
  return { width, height, contentHeight: Math.max(0, height - reservedLines) };
}

/**
 * Hook to get terminal dimensions with resize support
 */
export function useTerminalSize(reservedLines = 0): TerminalSize {
  const { stdout } = useStdout();

  const [size, setSize] = useState<TerminalSize>(() => measure(stdout.columns, stdout.rows, reservedLines));

  useEffect(() => {
    const handleResize = (): void => {
      setSize(measure(stdout.columns, stdout.rows, reservedLines));
    };

    handleResize();
    stdout.on("resize", handleResize);
    return () => {
      stdout.off("resize", handleResize);
    };
  }, [stdout, reservedLines]);

  return size;
}
