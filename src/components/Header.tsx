import { Box, Text } from "ink";
import BigText from "ink-big-text";
import type React from "react";

export const Header: React.FC = () => {
  return (
    <Box flexDirection="column" marginBottom={1}>
      <BigText text="BFU" font="tiny" />
      <Text color="white">Bluetooth firmware uploader</Text>
    </Box>
  );
};
