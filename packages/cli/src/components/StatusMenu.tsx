import React from 'react';
import { Box, Text } from 'ink';
import type { Presentation } from '@auditray/shared';
import { QUIT } from '@auditray/core';
import { THEME } from '../theme.js';

interface StatusMenuProps {
  checkLabel: string;
  presentation: Presentation;
  selected: number;
}

/** The tray menu: check item, status line, one row per update, quit. */
export const StatusMenu: React.FC<StatusMenuProps> = ({ checkLabel, presentation, selected }) => {
  return (
    <Box flexDirection="column" paddingX={1}>
      <Text>
        <Text color={THEME.dim}>[c] </Text>
        <Text color={THEME.text}>{checkLabel}</Text>
      </Text>
      <Text color={statusColor(presentation)}>{presentation.text}</Text>
      {presentation.updates.map((update, i) => (
        <Text key={`${i}-${update.link}`} color={i === selected ? THEME.primary : THEME.textDim}>
          {i === selected ? '› ' : '  '}
          {update.text}
        </Text>
      ))}
      <QuitItem />
    </Box>
  );
};

export const QuitItem: React.FC = () => (
  <Text>
    <Text color={THEME.dim}>[q] </Text>
    <Text color={THEME.text}>{QUIT}</Text>
  </Text>
);

function statusColor(presentation: Presentation): string {
  switch (presentation.icon) {
    case 'check':
      return THEME.success;
    case 'alert':
      return THEME.warning;
    case 'cross':
      return THEME.error;
  }
}
