import { useCallback, useEffect, useMemo, useRef, useState } from 'react';
import FolderBrowser from './FolderBrowser';
import SettingsPanel from './SettingsPanel';
import type { SettingChange } from './SettingsPanel';
import { BridgeError, captionerApi } from './lib/bridge';
import { createDebouncedPatchSaver } from './lib/debounce';
import { applyJobProgress, describeJobProgress, isJobActive } from './lib/jobProgress';
import { clampIndex, formatPosition, navigationOffset, parseOneBasedJump } from './lib/pagination';
import { SCAN_MODE_OPTIONS, formatWindowGeometry, pickOption } from './lib/settingsOptions';
import type {
  BackendModelLists,
  CaptionerSettings,
  CaptionJobStatus,
  ImageItem,
  LocalModelStatus,
  PromptTemplateSummary,
  ScanMode,
  TemplateFormat
} from './types';

type View = 'loading' | 'splash' | 'editor';

const JOB_POLL_MS = 700;
const EMPTY_MODELS: BackendModelLists = { gemini: [], xai: [], openrouter: [] };

function errorMessage(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback;
}

function App() {
  const [view, setView] = useState<View>('loading');
  const [settings, setSettings] = useState<CaptionerSettings | null>(null);
  const [models, setModels] = useState<BackendModelLists>(EMPTY_MODELS);
  const [templates, setTemplates] = useState<PromptTemplateSummary[]>([]);
  const [templateFormat, setTemplateFormat] = useState<TemplateFormat>('captioning');
  const [localStatus, setLocalStatus] = useState<LocalModelStatus | null>(null);
  const [folder, setFolder] = useState<string | null>(null);
  const [mode, setMode] = useState<ScanMode>('top-level');
  const [items, setItems] = useState<ImageItem[]>([]);
  const [checked, setChecked] = useState<Record<string, boolean>>({});
  const [currentIndex, setCurrentIndex] = useState(0);
  const [jumpInput, setJumpInput] = useState('1');
  const [captionText, setCaptionText] = useState('');
  const [originalCaption, setOriginalCaption] = useState('');
  const [imageErrors, setImageErrors] = useState<Record<string, boolean>>({});
  const [job, setJob] = useState<CaptionJobStatus | null>(null);
  const [isBrowserOpen, setIsBrowserOpen] = useState(false);
  const [statusMessage, setStatusMessage] = useState<string | null>(null);

  const itemRefs = useRef<Array<HTMLElement | null>>([]);
  const captionDirtyRef = useRef(false);

  const currentItem = items[currentIndex] ?? null;
  const jobActive = job !== null && isJobActive(job);

  useEffect(() => {
    captionDirtyRef.current = captionText !== originalCaption;
  }, [captionText, originalCaption]);

  const settingsSaver = useMemo(
    () =>
      createDebouncedPatchSaver<CaptionerSettings>(400, async (updates) => {
        try {
          await captionerApi.updateSettings(updates);
        } catch (error) {
          setStatusMessage(`Unable to save settings: ${errorMessage(error, 'unknown error')}`);
        }
      }),
    []
  );

  const flushSettings = useCallback(() => settingsSaver.flush(), [settingsSaver]);

  const handleSettingChange = useCallback<SettingChange>(
    (key, value) => {
      setSettings((current) => (current ? { ...current, [key]: value } : current));
      const patch: Partial<CaptionerSettings> = {};
      patch[key] = value;
      settingsSaver.schedule(patch);
    },
    [settingsSaver]
  );

  const loadCaption = useCallback(async (item: ImageItem | null) => {
    if (!item) {
      setCaptionText('');
      setOriginalCaption('');
      return;
    }

    try {
      const caption = await captionerApi.readCaption(item.sourcePath);
      setCaptionText(caption.text);
      setOriginalCaption(caption.text);
    } catch (error) {
      setStatusMessage(`Unable to read caption: ${errorMessage(error, 'unknown error')}`);
    }
  }, []);

  const selectAndLoadFolder = useCallback(
    async (selectedFolder: string, selectedMode: ScanMode) => {
      setView('loading');
      setStatusMessage(null);

      try {
        const scannedItems = await captionerApi.scanImages({ folder: selectedFolder, mode: selectedMode });

        setFolder(selectedFolder);
        setMode(selectedMode);
        setItems(scannedItems);
        setChecked({});
        setImageErrors({});
        setCurrentIndex(0);
        setJumpInput(scannedItems.length > 0 ? '1' : '0');
        await loadCaption(scannedItems[0] ?? null);
        setView('editor');
      } catch (error) {
        setStatusMessage(`Unable to scan folder: ${errorMessage(error, 'Failed to read folder.')}`);
        setFolder(null);
        setItems([]);
        setView('splash');
      }
    },
    [loadCaption]
  );

  useEffect(() => {
    let mounted = true;

    (async () => {
      try {
        const [loadedSettings, loadedModels, loadedTemplates, loadedLocal, loadedJob, initialFolder] =
          await Promise.all([
            captionerApi.getSettings(),
            captionerApi.listModels(),
            captionerApi.listTemplates(),
            captionerApi.localStatus(),
            captionerApi.jobStatus(),
            captionerApi.getInitialFolder()
          ]);

        if (!mounted) {
          return;
        }

        setSettings(loadedSettings);
        setModels(loadedModels);
        setTemplates(loadedTemplates);
        setTemplateFormat(
          loadedTemplates.find((template) => template.name === loadedSettings.selectedTemplate)?.format ?? 'captioning'
        );
        setLocalStatus(loadedLocal);
        setJob(loadedJob);
        setMode(loadedSettings.scanMode);

        if (!initialFolder) {
          setView('splash');
          return;
        }

        await selectAndLoadFolder(initialFolder, loadedSettings.scanMode);
      } catch (error) {
        if (!mounted) {
          return;
        }

        setStatusMessage(`Unable to reach the captioner host: ${errorMessage(error, 'unknown error')}`);
        setView('splash');
      }
    })();

    return () => {
      mounted = false;
    };
  }, [selectAndLoadFolder]);

  useEffect(() => {
    let timer: ReturnType<typeof setTimeout> | null = null;

    const resizeHandler = () => {
      if (timer) {
        clearTimeout(timer);
      }

      timer = setTimeout(() => {
        handleSettingChange('windowGeometry', formatWindowGeometry(window.innerWidth, window.innerHeight));
      }, 500);
    };

    window.addEventListener('resize', resizeHandler);
    return () => {
      window.removeEventListener('resize', resizeHandler);
      if (timer) {
        clearTimeout(timer);
      }
    };
  }, [handleSettingChange]);

  const goToIndex = useCallback(
    (targetIndex: number) => {
      const clamped = clampIndex(targetIndex, items.length);
      if (clamped !== currentIndex && captionDirtyRef.current && !window.confirm('Discard unsaved caption changes?')) {
        return;
      }

      setCurrentIndex(clamped);
      setJumpInput(String(clamped + 1));
      itemRefs.current[clamped]?.scrollIntoView({ block: 'nearest', inline: 'nearest', behavior: 'auto' });
      void loadCaption(items[clamped] ?? null);
    },
    [currentIndex, items, loadCaption]
  );

  useEffect(() => {
    const keydownHandler = (event: KeyboardEvent) => {
      if (items.length === 0) {
        return;
      }

      const target = event.target;
      if (target instanceof HTMLInputElement || target instanceof HTMLTextAreaElement || target instanceof HTMLSelectElement) {
        return;
      }

      const offset = navigationOffset(event.key);
      if (offset !== null) {
        event.preventDefault();
        goToIndex(currentIndex + offset);
      }
    };

    window.addEventListener('keydown', keydownHandler, { passive: false });
    return () => window.removeEventListener('keydown', keydownHandler);
  }, [currentIndex, goToIndex, items.length]);

  useEffect(() => {
    if (!jobActive) {
      return;
    }

    const poll = async () => {
      try {
        const next = await captionerApi.jobStatus();
        setJob(next);
        setItems((current) => applyJobProgress(current, next));

        if (currentItem && next.doneImages.includes(currentItem.sourcePath) && !captionDirtyRef.current) {
          await loadCaption(currentItem);
        }
      } catch (error) {
        setStatusMessage(`Unable to read job status: ${errorMessage(error, 'unknown error')}`);
      }
    };

    const interval = setInterval(() => {
      void poll();
    }, JOB_POLL_MS);

    return () => clearInterval(interval);
  }, [currentItem, jobActive, loadCaption]);

  const refreshFolder = useCallback(async () => {
    if (folder) {
      await selectAndLoadFolder(folder, mode);
    }
  }, [folder, mode, selectAndLoadFolder]);

  const handleSaveCaption = useCallback(async () => {
    if (!currentItem) {
      return;
    }

    try {
      await captionerApi.saveCaption({ imagePath: currentItem.sourcePath, text: captionText });
      setOriginalCaption(captionText);
      setItems((current) =>
        current.map((item) => (item.id === currentItem.id ? { ...item, hasCaption: true } : item))
      );
      setStatusMessage(`Saved caption for ${currentItem.baseName}${currentItem.ext}`);
    } catch (error) {
      setStatusMessage(`Save failed: ${errorMessage(error, 'Unable to save caption.')}`);
    }
  }, [captionText, currentItem]);

  const handleDeleteCaption = useCallback(async () => {
    if (!currentItem || !window.confirm(`Delete the caption for ${currentItem.baseName}${currentItem.ext}?`)) {
      return;
    }

    try {
      await captionerApi.deleteCaption(currentItem.sourcePath);
      setCaptionText('');
      setOriginalCaption('');
      setItems((current) =>
        current.map((item) => (item.id === currentItem.id ? { ...item, hasCaption: false } : item))
      );
    } catch (error) {
      setStatusMessage(`Delete failed: ${errorMessage(error, 'Unable to delete caption.')}`);
    }
  }, [currentItem]);

  const handleSelectTemplate = useCallback(
    (name: string) => {
      const template = templates.find((entry) => entry.name === name);
      handleSettingChange('selectedTemplate', name);
      if (template) {
        setTemplateFormat(template.format);
        handleSettingChange('systemPrompt', template.prompt);
      }
    },
    [handleSettingChange, templates]
  );

  const saveTemplate = useCallback(
    async (name: string, allowOverwrite: boolean) => {
      if (!settings) {
        return;
      }

      try {
        const saved = await captionerApi.saveTemplate({
          name,
          format: templateFormat,
          prompt: settings.systemPrompt,
          allowOverwrite
        });
        setTemplates(await captionerApi.listTemplates());
        handleSettingChange('selectedTemplate', saved.name);
        setStatusMessage(`Saved template "${saved.name}"`);
      } catch (error) {
        if (error instanceof BridgeError && error.code === 'conflict' && !allowOverwrite) {
          if (window.confirm(`${error.message} Overwrite it?`)) {
            await saveTemplate(name, true);
          }

          return;
        }

        setStatusMessage(`Template not saved: ${errorMessage(error, 'unknown error')}`);
      }
    },
    [handleSettingChange, settings, templateFormat]
  );

  const handleSaveTemplateAs = useCallback(() => {
    const name = window.prompt('Template name');
    if (name?.trim()) {
      void saveTemplate(name.trim(), false);
    }
  }, [saveTemplate]);

  const handleDeleteTemplate = useCallback(async () => {
    if (!settings || !window.confirm(`Delete template "${settings.selectedTemplate}"?`)) {
      return;
    }

    try {
      const remaining = await captionerApi.deleteTemplate(settings.selectedTemplate);
      setTemplates(remaining);
      const fallback = remaining[0];
      if (fallback) {
        handleSelectTemplate(fallback.name);
      }
    } catch (error) {
      setStatusMessage(`Template not deleted: ${errorMessage(error, 'unknown error')}`);
    }
  }, [handleSelectTemplate, settings]);

  const handleLoadLocal = useCallback(async () => {
    try {
      await flushSettings();
      setLocalStatus((current) => (current ? { ...current, loading: true } : current));
      setLocalStatus(await captionerApi.loadLocalModel());
      setStatusMessage('Local model loaded.');
    } catch (error) {
      setStatusMessage(`Model load failed: ${errorMessage(error, 'unknown error')}`);
      setLocalStatus(await captionerApi.localStatus().catch(() => null));
    }
  }, [flushSettings]);

  const handleUnloadLocal = useCallback(async () => {
    try {
      setLocalStatus(await captionerApi.unloadLocalModel());
    } catch (error) {
      setStatusMessage(`Unload failed: ${errorMessage(error, 'unknown error')}`);
    }
  }, []);

  const handleResetSettings = useCallback(async () => {
    if (!window.confirm('Reset all settings to their defaults?')) {
      return;
    }

    try {
      settingsSaver.cancel();
      setSettings(await captionerApi.resetSettings());
      setStatusMessage('Defaults restored');
    } catch (error) {
      setStatusMessage(`Reset failed: ${errorMessage(error, 'unknown error')}`);
    }
  }, [settingsSaver]);

  const handleStart = useCallback(async () => {
    const imagePaths = items.filter((item) => checked[item.id]).map((item) => item.sourcePath);

    try {
      await flushSettings();
      setStatusMessage(null);
      setJob(await captionerApi.startJob({ imagePaths, format: templateFormat }));
    } catch (error) {
      setStatusMessage(errorMessage(error, 'Unable to start captioning.'));
    }
  }, [checked, flushSettings, items, templateFormat]);

  const handleStop = useCallback(async () => {
    try {
      setJob(await captionerApi.stopJob());
    } catch (error) {
      setStatusMessage(errorMessage(error, 'Unable to stop captioning.'));
    }
  }, []);

  const checkedCount = items.filter((item) => checked[item.id]).length;
  const progress = job ? describeJobProgress(job) : null;

  const folderBrowser = isBrowserOpen ? (
    <FolderBrowser
      startPath={folder ?? settings?.lastFolder ?? ''}
      onClose={() => setIsBrowserOpen(false)}
      onSelect={(selected) => {
        setIsBrowserOpen(false);
        void selectAndLoadFolder(selected, mode);
      }}
    />
  ) : null;

  if (view === 'loading') {
    return (
      <main className="centered-shell">
        <section className="card splash-card">
          <h1>Dataset Captioner</h1>
          <p>Loading...</p>
        </section>
      </main>
    );
  }

  if (view === 'splash' || !settings) {
    return (
      <main className="centered-shell">
        <section className="card splash-card">
          <h1>Dataset Captioner</h1>
          <p>Choose a folder of images to caption.</p>
          {statusMessage ? <p className="error-text">{statusMessage}</p> : null}
          <button type="button" className="primary-btn" onClick={() => setIsBrowserOpen(true)}>
            Select Folder
          </button>
        </section>
        {folderBrowser}
      </main>
    );
  }

  return (
    <main className="app-shell">
      <header className="topbar">
        <div className="folder-label" title={folder ?? undefined}>
          {folder}
        </div>
        <div className="toolbar-controls">
          <label htmlFor="scan-mode">Scan mode</label>
          <select
            id="scan-mode"
            value={mode}
            disabled={jobActive}
            onChange={async (event) => {
              const nextMode = pickOption(SCAN_MODE_OPTIONS, event.target.value, mode);
              setMode(nextMode);
              if (folder) {
                await selectAndLoadFolder(folder, nextMode);
              }
            }}
          >
            {SCAN_MODE_OPTIONS.map((option) => (
              <option value={option.value} key={option.value}>
                {option.label}
              </option>
            ))}
          </select>
          <button type="button" className="secondary-btn" disabled={jobActive} onClick={refreshFolder}>
            Reload
          </button>
          <button type="button" className="secondary-btn" disabled={jobActive} onClick={() => setIsBrowserOpen(true)}>
            Browse
          </button>
        </div>
      </header>

      <div className="workspace">
        <section className="thumb-column" aria-label="Images">
          <div className="thumb-actions">
            <button
              type="button"
              className="secondary-btn"
              onClick={() => setChecked(Object.fromEntries(items.map((item) => [item.id, true])))}
            >
              Select All
            </button>
            <button type="button" className="secondary-btn" onClick={() => setChecked({})}>
              Clear
            </button>
            <span className="muted-text">
              {checkedCount}/{items.length} checked
            </span>
          </div>

          {items.length === 0 ? (
            <p className="empty-state">No images found for this folder and scan mode.</p>
          ) : (
            <ul className="thumb-list">
              {items.map((item, index) => (
                <li
                  key={item.id}
                  className={`thumb-item${index === currentIndex ? ' is-current' : ''}`}
                  ref={(node) => {
                    itemRefs.current[index] = node;
                  }}
                >
                  <input
                    type="checkbox"
                    checked={checked[item.id] === true}
                    aria-label={`Include ${item.baseName}`}
                    onChange={(event) => setChecked((current) => ({ ...current, [item.id]: event.target.checked }))}
                  />
                  <button type="button" className="thumb-btn" onClick={() => goToIndex(index)}>
                    {imageErrors[item.id] ? (
                      <span className="image-fallback">?</span>
                    ) : (
                      <img
                        src={item.thumbUrl}
                        alt=""
                        loading="lazy"
                        onError={() => setImageErrors((current) => ({ ...current, [item.id]: true }))}
                      />
                    )}
                    <span className="thumb-name">
                      {item.relDir ? `${item.relDir}/` : ''}
                      {item.baseName}
                      {item.ext}
                    </span>
                    <span className={`caption-marker ${item.hasCaption ? 'has-caption' : 'no-caption'}`}>
                      {item.hasCaption ? 'txt' : '-'}
                    </span>
                  </button>
                </li>
              ))}
            </ul>
          )}

          <footer className="pager" aria-label="Pagination controls">
            <span>{formatPosition(currentIndex, items.length)}</span>
            <input
              value={jumpInput}
              onChange={(event) => setJumpInput(event.target.value)}
              onKeyDown={(event) => {
                if (event.key !== 'Enter') {
                  return;
                }

                event.preventDefault();
                if (items.length === 0) {
                  setJumpInput('0');
                  return;
                }

                goToIndex(parseOneBasedJump(jumpInput, items.length));
              }}
              aria-label="Jump to image"
              inputMode="numeric"
              pattern="[0-9]*"
            />
          </footer>
        </section>

        <section className="editor-column" aria-label="Caption editor">
          {currentItem ? (
            <>
              <div className="preview-column">
                {imageErrors[currentItem.id] ? (
                  <div className="image-fallback">Image preview unavailable</div>
                ) : (
                  <img src={currentItem.sourceUrl} alt={currentItem.baseName} />
                )}
              </div>
              <textarea
                className="editor-textarea"
                value={captionText}
                onChange={(event) => setCaptionText(event.target.value)}
                spellCheck
              />
              <div className="editor-actions">
                <button type="button" className="primary-btn" onClick={() => void handleSaveCaption()}>
                  Save
                </button>
                <button
                  type="button"
                  className="secondary-btn"
                  disabled={captionText === originalCaption}
                  onClick={() => setCaptionText(originalCaption)}
                >
                  Revert
                </button>
                <button
                  type="button"
                  className="secondary-btn"
                  disabled={!currentItem.hasCaption}
                  onClick={() => void handleDeleteCaption()}
                >
                  Delete Caption
                </button>
                <span className="muted-text" title={currentItem.captionPath}>
                  {captionText === originalCaption ? currentItem.captionPath : 'Unsaved changes'}
                </span>
              </div>
            </>
          ) : (
            <p className="empty-state">Select an image to edit its caption.</p>
          )}
        </section>

        <SettingsPanel
          settings={settings}
          models={models}
          templates={templates}
          templateFormat={templateFormat}
          localStatus={localStatus}
          busy={jobActive}
          onChange={handleSettingChange}
          onTemplateFormatChange={setTemplateFormat}
          onSelectTemplate={handleSelectTemplate}
          onSaveTemplate={() => void saveTemplate(settings.selectedTemplate, true)}
          onSaveTemplateAs={handleSaveTemplateAs}
          onDeleteTemplate={() => void handleDeleteTemplate()}
          onLoadLocal={() => void handleLoadLocal()}
          onUnloadLocal={() => void handleUnloadLocal()}
          onReset={() => void handleResetSettings()}
        />
      </div>

      <footer className="job-bar" aria-label="Captioning controls">
        <button
          type="button"
          className="primary-btn"
          disabled={jobActive || checkedCount === 0}
          onClick={() => void handleStart()}
        >
          Start ({checkedCount})
        </button>
        <button
          type="button"
          className="secondary-btn"
          disabled={job?.state !== 'running'}
          onClick={() => void handleStop()}
        >
          Stop
        </button>
        <progress max={100} value={progress?.percent ?? 0} />
        <span className={job?.state === 'failed' ? 'error-text' : 'muted-text'} role="status">
          {(jobActive ? progress?.line : statusMessage ?? progress?.line) ?? 'Idle'}
        </span>
      </footer>

      {folderBrowser}
    </main>
  );
}

export default App;
