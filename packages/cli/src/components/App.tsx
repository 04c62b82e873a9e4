import React, { useEffect } from 'react';
import { Box, Text, useApp, useInput } from 'ink';
import type { CoordinatorState, IconName, Status } from '@auditray/shared';
import { errorMessage, type IconSet } from '@auditray/core';
import type { StatusSource } from '../ws.client.js';
import type { LinkOpener } from '../link.opener.js';
import { useAppStore, checkLabel, presentation, headerIcon } from '../store/app.store.js';
import { THEME } from '../theme.js';
import { Header } from './Header.js';
import { StatusMenu, QuitItem } from './StatusMenu.js';
import { MessageLog } from './MessageLog.js';

interface AppProps {
  /** Null in debug-icon mode, where nothing talks to a daemon. */
  source: StatusSource | null;
  icons: IconSet;
  debugIcon: IconName | null;
  openLink: LinkOpener;
}

export const App: React.FC<AppProps> = ({ source, icons, debugIcon, openLink }) => {
  const { exit } = useApp();
  const [state, dispatch] = useAppStore();

  // ── Status source wiring ───────────────────────────────────────────────────
  useEffect(() => {
    if (!source) return;

    const onStatus = (status: Status) => dispatch({ type: 'STATUS_RECEIVED', status });
    const onState = (coordinatorState: CoordinatorState) =>
      dispatch({ type: 'COORDINATOR_STATE', state: coordinatorState });
    const onServerError = (message: string) =>
      dispatch({ type: 'ADD_MESSAGE', message: `Daemon: ${message}` });
    const onWsError = (err: Error) => dispatch({ type: 'ADD_MESSAGE', message: err.message });

    source.on('status', onStatus);
    source.on('coordinator:state', onState);
    source.on('server:error', onServerError);
    source.on('ws:error', onWsError);

    return () => {
      source.off('status', onStatus);
      source.off('coordinator:state', onState);
      source.off('server:error', onServerError);
      source.off('ws:error', onWsError);
    };
  }, [source, dispatch]);

  const view = presentation(state);

  // ── Keyboard ───────────────────────────────────────────────────────────────
  useInput((input, key) => {
    if (input === 'q' || (key.ctrl && input === 'c')) {
      exit();
      return;
    }
    if (!source) return;

    if (input === 'c') {
      dispatch({ type: 'CHECK_REQUESTED' });
      source.checkNow();
    } else if (key.upArrow) {
      dispatch({ type: 'MOVE_SELECTION', delta: -1 });
    } else if (key.downArrow) {
      dispatch({ type: 'MOVE_SELECTION', delta: 1 });
    } else if (key.return) {
      const update = view.updates[state.selected];
      if (!update) return;
      openLink(update.link).catch((err: unknown) => {
        dispatch({ type: 'ADD_MESSAGE', message: errorMessage(err) });
      });
    }
  });

  // ── Render ─────────────────────────────────────────────────────────────────
  const icon = icons[headerIcon(state, debugIcon)];

  if (!source) {
    return (
      <Box flexDirection="column">
        <Header icon={icon} busy={false} />
        <Box paddingX={1}>
          <QuitItem />
        </Box>
      </Box>
    );
  }

  return (
    <Box flexDirection="column">
      <Header icon={icon} busy={state.coordinatorState === 'running'} />
      <StatusMenu checkLabel={checkLabel(state)} presentation={view} selected={state.selected} />
      <MessageLog messages={state.messages} />
      {view.updates.length > 0 && (
        <Box paddingX={1}>
          <Text color={THEME.dim}>↑/↓ select  Enter open advisory</Text>
        </Box>
      )}
    </Box>
  );
};
