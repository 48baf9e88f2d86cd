import { useCallback, useEffect, useState } from 'react';
import { captionerApi } from './lib/bridge';
import type { DirectoryListing } from './types';

interface FolderBrowserProps {
  startPath: string;
  onSelect: (folder: string) => void;
  onClose: () => void;
}

function joinPath(parent: string, child: string): string {
  const separator = parent.includes('\\') && !parent.includes('/') ? '\\' : '/';
  return parent.endsWith(separator) ? `${parent}${child}` : `${parent}${separator}${child}`;
}

function FolderBrowser({ startPath, onSelect, onClose }: FolderBrowserProps) {
  const [listing, setListing] = useState<DirectoryListing | null>(null);
  const [pathInput, setPathInput] = useState(startPath);
  const [error, setError] = useState<string | null>(null);

  const open = useCallback(async (target: string) => {
    try {
      const next = await captionerApi.listDirectories(target);
      setListing(next);
      setPathInput(next.path);
      setError(null);
    } catch (openError) {
      setError(openError instanceof Error ? openError.message : 'Unable to open folder.');
    }
  }, []);

  useEffect(() => {
    void open(startPath);
  }, [open, startPath]);

  useEffect(() => {
    const keydownHandler = (event: KeyboardEvent) => {
      if (event.key === 'Escape') {
        onClose();
      }
    };

    window.addEventListener('keydown', keydownHandler);
    return () => window.removeEventListener('keydown', keydownHandler);
  }, [onClose]);

  return (
    <div className="modal-overlay" role="dialog" aria-modal="true" aria-label="Choose folder">
      <div className="modal-card folder-browser">
        <header className="modal-header">
          <h2>Choose Folder</h2>
        </header>

        <form
          className="folder-browser-path"
          onSubmit={(event) => {
            event.preventDefault();
            void open(pathInput);
          }}
        >
          <input value={pathInput} onChange={(event) => setPathInput(event.target.value)} aria-label="Folder path" />
          <button type="submit" className="secondary-btn">
            Go
          </button>
          <button
            type="button"
            className="secondary-btn"
            disabled={!listing?.parent}
            onClick={() => {
              if (listing?.parent) {
                void open(listing.parent);
              }
            }}
          >
            Up
          </button>
        </form>

        {error ? <p className="error-text">{error}</p> : null}

        <ul className="folder-browser-list">
          {listing?.directories.length === 0 ? <li className="muted-text">No sub-folders</li> : null}
          {listing?.directories.map((name) => (
            <li key={name}>
              <button type="button" className="link-btn" onClick={() => void open(joinPath(listing.path, name))}>
                {name}
              </button>
            </li>
          ))}
        </ul>

        <footer className="modal-actions">
          <button type="button" className="secondary-btn" onClick={onClose}>
            Cancel
          </button>
          <button
            type="button"
            className="primary-btn"
            disabled={!listing}
            onClick={() => {
              if (listing) {
                onSelect(listing.path);
              }
            }}
          >
            Use This Folder
          </button>
        </footer>
      </div>
    </div>
  );
}

export default FolderBrowser;
