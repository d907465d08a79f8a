/**
 * Root application component for Pixel Shuffle.
 */

import React from 'react';
import { AppProvider } from './context/AppContext';
import { AppHeader } from './components/layout/AppHeader';
import { UploadPanel } from './components/upload/UploadPanel';
import { ImageWorkspace } from './components/workspace/ImageWorkspace';
import { StatusBanner } from './components/shared/StatusBanner';

export default function App() {
  return (
    <AppProvider>
      <AppHeader />

      <div className="app-layout">
        <UploadPanel />
        <ImageWorkspace />
      </div>

      <StatusBanner />
    </AppProvider>
  );
}
