import React from "react";
import { Box, Text } from "ink";

interface HelpModalProps {
  rows: number;
  cols: number;
}

export const HelpModal: React.FC<HelpModalProps> = ({ rows, cols }) => {
  const modalWidth = Math.min(90, cols - 4);
  const modalHeight = Math.min(34, rows - 4);

  return (
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
        width={modalWidth}
        height={modalHeight}
        borderStyle="double"
        borderColor="cyan"
        padding={1}
      >
        <Box justifyContent="center" marginBottom={1}>
          <Text bold color="cyan">
            Help - Keyboard Shortcuts
          </Text>
        </Box>

        <Box flexDirection="row" justifyContent="space-between">
          <Box flexDirection="column" width="48%">
            <Text bold color="yellow">Global</Text>
            <Text>  F1         Show this help</Text>
            <Text>  Esc        Exit (press twice to quit)</Text>
            <Text>  Ctrl+C     Force quit</Text>
            <Text>  Ctrl+G     Generate prompt</Text>
            <Text>  Ctrl+U     Apply model response</Text>
            <Text>  Tab        Switch panes</Text>
            <Text></Text>
            <Text bold color="yellow">Explorer Pane</Text>
            <Text>  j/k        Move cursor down/up</Text>
            <Text>  h/l        Collapse/expand directory</Text>
            <Text>  Space      Toggle file or whole folder</Text>
            <Text>  Enter      Expand folder / toggle file</Text>
            <Text>  / or f     Filter files</Text>
            <Text>  d          Change root directory</Text>
            <Text>  a/n        Select all / none</Text>
          </Box>

          <Box flexDirection="column" width="48%">
            <Text bold color="yellow">Config Pane</Text>
            <Text>  Left/Right Switch tabs</Text>
            <Text>  Inputs:    p/c/o/i problem/constraints/</Text>
            <Text>             format/additional info</Text>
            <Text>  Templates: e/t cycle ext. preset/template</Text>
            <Text>             j/k + s/l/x save/load/delete</Text>
            <Text>  Options:   e/x edit extensions/exclusions</Text>
            <Text>             g/r gitignore/reflection</Text>
            <Text>             +/- solutions, k chunk size</Text>
            <Text>             m/n minify/strip comments</Text>
            <Text></Text>
            <Text bold color="yellow">Prompt View</Text>
            <Text>  y/w        Copy/save  [ ] Prev/next part</Text>
            <Text></Text>
            <Text bold color="yellow">Apply View</Text>
            <Text>  v/f        Paste response/load from file</Text>
            <Text>  Space/a    Toggle edit/apply selected</Text>
            <Text>  c          Clear parsed response</Text>
            <Text>  b/r        Backups list/restore backup</Text>
            <Text>  Esc/q      Return to main view</Text>
          </Box>
        </Box>

        <Box justifyContent="center" marginTop={1}>
          <Text dimColor>Press Esc or F1 to close</Text>
        </Box>
      </Box>
    </Box>
  );
};
