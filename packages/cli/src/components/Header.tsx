import React, { useEffect, useState } from 'react';
import { Box, Text } from 'ink';
import type { IconGlyph } from '@auditray/core';
import { THEME } from '../theme.js';

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

interface HeaderProps {
  icon: IconGlyph;
  /** True while the daemon is running a check. */
  busy: boolean;
}

export const Header: React.FC<HeaderProps> = ({ icon, busy }) => {
  const [frame, setFrame] = useState(0);

  useEffect(() => {
    if (!busy) return;
    const timer = setInterval(() => setFrame((f) => f + 1), 80);
    return () => clearInterval(timer);
  }, [busy]);

  return (
    <Box borderStyle="single" borderColor={THEME.accent} paddingX={1} gap={1}>
      <Text color={icon.color}>{icon.glyph}</Text>
      <Text bold color={THEME.primary}>
        auditray
      </Text>
      {busy && <Text color={THEME.dim}>{SPINNER_FRAMES[frame % SPINNER_FRAMES.length]}</Text>}
    </Box>
  );
};
