import React from "react";
import { Box, Text } from "ink";

interface ExitConfirmProps {
  rows: number;
  cols: number;
}

export const ExitConfirm: React.FC<ExitConfirmProps> = ({ rows, cols }) => (
  <Box
    position="absolute"
    flexDirection="column"
    width={cols}
    height={rows}
    justifyContent="center"
    alignItems="center"
  >
    <Box
      flexDirection="column"
      width={50}
      height={9}
      borderStyle="double"
      borderColor="yellow"
      padding={1}
      alignItems="center"
      justifyContent="center"
    >
      <Box marginBottom={1}>
        <Text bold color="yellow">
          Exit Confirmation
        </Text>
      </Box>
      <Text>Quit? Backups made this session stay on disk as *.bak.</Text>
      <Box marginTop={1}>
        <Text dimColor>Press </Text>
        <Text bold color="red">
          Esc
        </Text>
        <Text dimColor> to quit, any other key to cancel</Text>
      </Box>
    </Box>
  </Box>
);
