/**
 * Fixed-position status notification banner.
 * Color-coded by status type; fades out on its own or when clicked.
 */

import React, { useState, useEffect, useCallback, useRef } from 'react';
import { CONFIG } from '../../config';
import { useAppContext } from '../../context/AppContext';

export function StatusBanner() {
  const { state, dispatch } = useAppContext();
  const { status, statusType } = state;

  const [visible, setVisible] = useState(false);
  const [fading, setFading] = useState(false);
  const timers = useRef<number[]>([]);

  const clearTimers = useCallback(() => {
    timers.current.forEach((t) => window.clearTimeout(t));
    timers.current = [];
  }, []);

  const fadeOut = useCallback(() => {
    setFading(true);
    timers.current.push(
      window.setTimeout(() => {
        setVisible(false);
        setFading(false);
        dispatch({ type: 'CLEAR_STATUS' });
      }, CONFIG.statusFadeMs),
    );
  }, [dispatch]);

  useEffect(() => {
    clearTimers();
    if (!status) {
      setVisible(false);
      setFading(false);
      return;
    }
    setVisible(true);
    setFading(false);
    timers.current.push(window.setTimeout(fadeOut, CONFIG.statusTimeoutMs));
    return clearTimers;
  }, [status, fadeOut, clearTimers]);

  const handleDismiss = useCallback(() => {
    clearTimers();
    fadeOut();
  }, [clearTimers, fadeOut]);

  if (!visible || !status) return null;

  return (
    <div
      className={`status-banner status-${statusType}${fading ? ' fading' : ''}`}
      onClick={handleDismiss}
      role="status"
      aria-live="polite"
    >
      {status}
    </div>
  );
}
