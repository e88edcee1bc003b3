export interface AuthEvents {
  auth_step: [{ step: 'microsoft' | 'xbox_live' | 'xsts' | 'minecraft' | 'profile' }]
  /**
   * Emitted after a silent refresh attempt. `message` is set when the refresh failed.
   */
  auth_refresh: [{ success: boolean; message?: string }]
  /**
   * Emitted right before the authorize URL is handed to the browser.
   */
  auth_open_browser: [{ url: string }]
  auth_debug: [string]
}

export interface InstanceEvents {
  instance_created: [{ id: string; name: string; path: string }]
  instance_saved: [{ id: string; path: string }]
  instance_loaded: [{ amount: number }]
  /**
   * Emitted by `InstanceStore.loadAll` for every `instance.json` that could not be loaded. The file is
   * skipped.
   */
  instance_load_error: [{ path: string; message: string }]
  instance_debug: [string]
}
