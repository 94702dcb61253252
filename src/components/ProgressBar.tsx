import React from "react";
import { Box, Text } from "ink";

export interface ProgressBarProps {
  percent: number;
  color?: string;
  width?: number;
}

export const ProgressBar: React.FC<ProgressBarProps> = ({ percent, color = "green", width = 30 }) => {
  const filled = Math.round(Math.min(1, Math.max(0, percent)) * width);
  const empty = width - filled;
  return (
    <Box>
      <Text>[</Text>
      <Text color={color}>{"=".repeat(filled)}</Text>
      <Text dimColor>{"-".repeat(Math.max(0, empty))}</Text>
      <Text>]</Text>
    </Box>
  );
};
