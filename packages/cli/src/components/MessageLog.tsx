import React from 'react';
import { Box, Text } from 'ink';
import { THEME } from '../theme.js';

interface MessageLogProps {
  messages: string[];
}

export const MessageLog: React.FC<MessageLogProps> = ({ messages }) => {
  if (messages.length === 0) return null;

  return (
    <Box flexDirection="column" paddingX={1} marginTop={1}>
      {messages.map((msg, i) => (
        <Text key={i} color={THEME.warning}>
          {msg}
        </Text>
      ))}
    </Box>
  );
};
