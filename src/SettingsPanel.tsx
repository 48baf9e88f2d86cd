import {
  BACKEND_OPTIONS,
  FORMAT_OPTIONS,
  REASONING_OPTIONS,
  VLM_TYPE_OPTIONS,
  apiKeyField,
  formatSliderValue,
  modelField,
  pickOption,
  visibleSliders
} from './lib/settingsOptions';
import type {
  BackendModelLists,
  CaptionerSettings,
  LocalModelStatus,
  PromptTemplateSummary,
  TemplateFormat
} from './types';

export type SettingChange = <K extends keyof CaptionerSettings>(key: K, value: CaptionerSettings[K]) => void;

interface SettingsPanelProps {
  settings: CaptionerSettings;
  models: BackendModelLists;
  templates: PromptTemplateSummary[];
  templateFormat: TemplateFormat;
  localStatus: LocalModelStatus | null;
  busy: boolean;
  onChange: SettingChange;
  onTemplateFormatChange: (format: TemplateFormat) => void;
  onSelectTemplate: (name: string) => void;
  onSaveTemplate: () => void;
  onSaveTemplateAs: () => void;
  onDeleteTemplate: () => void;
  onLoadLocal: () => void;
  onUnloadLocal: () => void;
  onReset: () => void;
}

function describeLocalStatus(status: LocalModelStatus | null): string {
  if (!status) {
    return 'Unknown';
  }

  if (status.loading) {
    return 'Loading...';
  }

  if (status.loaded) {
    return `Loaded: ${status.modelPath ?? ''}`;
  }

  return status.error ? `Not loaded (${status.error})` : 'Not loaded';
}

function SettingsPanel({
  settings,
  models,
  templates,
  templateFormat,
  localStatus,
  busy,
  onChange,
  onTemplateFormatChange,
  onSelectTemplate,
  onSaveTemplate,
  onSaveTemplateAs,
  onDeleteTemplate,
  onLoadLocal,
  onUnloadLocal,
  onReset
}: SettingsPanelProps) {
  const keyField = apiKeyField(settings.backend);
  const currentModelField = modelField(settings.backend);
  const suggestions = settings.backend === 'local' ? [] : models[settings.backend];
  const selectedTemplate = templates.find((template) => template.name === settings.selectedTemplate);

  return (
    <aside className="settings-panel" aria-label="Captioning settings">
      <section className="settings-group">
        <label>
          Backend
          <select
            value={settings.backend}
            disabled={busy}
            onChange={(event) => onChange('backend', pickOption(BACKEND_OPTIONS, event.target.value, settings.backend))}
          >
            {BACKEND_OPTIONS.map((option) => (
              <option value={option.value} key={option.value}>
                {option.label}
              </option>
            ))}
          </select>
        </label>

        {keyField ? (
          <label>
            API Key
            <input
              type="password"
              autoComplete="off"
              value={settings[keyField]}
              onChange={(event) => onChange(keyField, event.target.value)}
            />
          </label>
        ) : null}

        {currentModelField ? (
          <label>
            Model
            <input
              list="model-suggestions"
              value={settings[currentModelField]}
              onChange={(event) => onChange(currentModelField, event.target.value)}
            />
            <datalist id="model-suggestions">
              {suggestions.map((model) => (
                <option value={model} key={model} />
              ))}
            </datalist>
          </label>
        ) : null}

        {settings.backend === 'local' ? (
          <>
            <label>
              Model (.gguf)
              <input value={settings.localModelPath} onChange={(event) => onChange('localModelPath', event.target.value)} />
            </label>
            <label>
              Projector (mmproj .gguf)
              <input
                value={settings.localMmprojPath}
                onChange={(event) => onChange('localMmprojPath', event.target.value)}
              />
            </label>
            <label>
              VLM Type
              <select
                value={settings.vlmType}
                onChange={(event) => onChange('vlmType', pickOption(VLM_TYPE_OPTIONS, event.target.value, settings.vlmType))}
              >
                {VLM_TYPE_OPTIONS.map((option) => (
                  <option value={option.value} key={option.value}>
                    {option.label}
                  </option>
                ))}
              </select>
            </label>
            <label>
              llama-server
              <input
                value={settings.llamaServerPath}
                onChange={(event) => onChange('llamaServerPath', event.target.value)}
              />
            </label>
            <label>
              Context
              <input
                type="number"
                value={settings.contextSize}
                onChange={(event) => onChange('contextSize', Number(event.target.value) || 0)}
              />
            </label>
            <label>
              GPU Layers
              <input
                type="number"
                value={settings.gpuLayers}
                onChange={(event) => onChange('gpuLayers', Number(event.target.value) || 0)}
              />
            </label>
            <div className="settings-row">
              <button
                type="button"
                className="secondary-btn"
                disabled={busy || localStatus?.loading === true}
                onClick={onLoadLocal}
              >
                Load
              </button>
              <button
                type="button"
                className="secondary-btn"
                disabled={busy || !localStatus?.loaded}
                onClick={onUnloadLocal}
              >
                Unload
              </button>
              <span className="muted-text" title={localStatus?.modelPath ?? undefined}>
                {describeLocalStatus(localStatus)}
              </span>
            </div>
          </>
        ) : (
          <label>
            Reasoning
            <select
              value={settings.reasoningEffort}
              onChange={(event) =>
                onChange('reasoningEffort', pickOption(REASONING_OPTIONS, event.target.value, settings.reasoningEffort))
              }
            >
              {REASONING_OPTIONS.map((option) => (
                <option value={option.value} key={option.value}>
                  {option.label}
                </option>
              ))}
            </select>
          </label>
        )}
      </section>

      <section className="settings-group">
        {visibleSliders(settings.backend).map((slider) => (
          <label className="slider-label" key={slider.key}>
            <span>
              {slider.label}: {formatSliderValue(slider, settings[slider.key])}
            </span>
            <input
              type="range"
              min={slider.min}
              max={slider.max}
              step={slider.step}
              value={settings[slider.key]}
              onChange={(event) => onChange(slider.key, Number(event.target.value))}
            />
          </label>
        ))}
      </section>

      <section className="settings-group">
        <label>
          Template
          <select value={settings.selectedTemplate} onChange={(event) => onSelectTemplate(event.target.value)}>
            {selectedTemplate ? null : <option value={settings.selectedTemplate}>{settings.selectedTemplate}</option>}
            {templates.map((template) => (
              <option value={template.name} key={template.name}>
                {template.builtIn ? `${template.name} (built-in)` : template.name}
              </option>
            ))}
          </select>
        </label>
        <label>
          Output Format
          <select
            value={templateFormat}
            onChange={(event) => onTemplateFormatChange(pickOption(FORMAT_OPTIONS, event.target.value, templateFormat))}
          >
            {FORMAT_OPTIONS.map((option) => (
              <option value={option.value} key={option.value}>
                {option.label}
              </option>
            ))}
          </select>
        </label>
        <div className="settings-row">
          <button type="button" className="secondary-btn" disabled={selectedTemplate?.builtIn !== false} onClick={onSaveTemplate}>
            Save
          </button>
          <button type="button" className="secondary-btn" onClick={onSaveTemplateAs}>
            Save As
          </button>
          <button
            type="button"
            className="secondary-btn"
            disabled={selectedTemplate?.builtIn !== false}
            onClick={onDeleteTemplate}
          >
            Delete
          </button>
        </div>
        <label className="modal-textarea-label">
          System Prompt
          <textarea value={settings.systemPrompt} onChange={(event) => onChange('systemPrompt', event.target.value)} />
        </label>
      </section>

      <section className="settings-group">
        <label>
          Output Folder
          <input
            value={settings.outputDir}
            placeholder="Next to each image"
            onChange={(event) => onChange('outputDir', event.target.value)}
          />
        </label>
        <label className="modal-checkbox">
          <input
            type="checkbox"
            checked={settings.skipExisting}
            onChange={(event) => onChange('skipExisting', event.target.checked)}
          />
          Skip images that already have a caption
        </label>
        <button type="button" className="secondary-btn" disabled={busy} onClick={onReset}>
          Reset Defaults
        </button>
      </section>
    </aside>
  );
}

export default SettingsPanel;
