import React from "react";
import { Box, Text } from "ink";

export interface ScrollableBoxProps {
  children: React.ReactNode;
  height: number;
  scrollOffset: number;
  showScrollbar?: boolean;
  accentColor?: string;
}

export const ScrollableBox: React.FC<ScrollableBoxProps> = ({
  children,
  height,
  scrollOffset,
  showScrollbar = true,
  accentColor = "cyan"
}) => {
  const childArray = React.Children.toArray(children);
  const totalItems = childArray.length;
  const needsScrollbar = totalItems > height;
  const visibleChildren = childArray.slice(scrollOffset, scrollOffset + height);

  const trackHeight = Math.max(1, height - 2); // -2 for up/down arrows
  const thumbSize = totalItems > 0 ? Math.max(1, Math.round((height / totalItems) * trackHeight)) : 1;
  const maxThumbPos = Math.max(0, trackHeight - thumbSize);
  const scrollRatio = totalItems > height ? scrollOffset / (totalItems - height) : 0;
  const thumbPos = Math.round(scrollRatio * maxThumbPos);

  const canScrollUp = scrollOffset > 0;
  const canScrollDown = scrollOffset + height < totalItems;

  return (
    <Box flexDirection="row" height={height}>
      <Box flexDirection="column" flexGrow={1} overflow="hidden">
        {visibleChildren}
      </Box>
      {showScrollbar && needsScrollbar && (
        <Box flexDirection="column" width={1} marginLeft={1}>
          <Text color={canScrollUp ? accentColor : "gray"}>^</Text>
          {Array.from({ length: trackHeight }).map((_, i) => {
            const isThumb = i >= thumbPos && i < thumbPos + thumbSize;
            return (
              <Text key={i} color={isThumb ? accentColor : "gray"}>
                {isThumb ? "#" : "|"}
              </Text>
            );
          })}
          <Text color={canScrollDown ? accentColor : "gray"}>v</Text>
        </Box>
      )}
    </Box>
  );
};
