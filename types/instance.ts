import type InstanceStore from '../lib/instances/instances'

export type LoaderType = 'VANILLA' | 'FABRIC' | 'FORGE' | 'NEOFORGE' | 'QUILT'

export interface ModLoader {
  type: LoaderType
  /** Loader version, empty for vanilla */
  version: string
}

export interface RamInfo {
  minimumMB: number
  maximumMB: number
}

export interface WindowSize {
  width: number
  height: number
  fullscreen: boolean
}

export interface Mod {
  name: string
  /** File name inside the `mods/` folder of the instance */
  fileName: string
  version?: string
  url?: string
  sha1?: string
  source: 'MODRINTH' | 'CURSEFORGE' | 'LOCAL'
}

/**
 * A named Minecraft installation, persisted as `instance.json` in its own directory.
 */
export interface InstanceModel {
  /** v4 UUID, set on creation and never changed */
  id: string
  name: string
  description: string
  minecraftVersion: string
  loader: ModLoader
  /** Path to the Java executable, empty to let the launcher pick one */
  javaPath: string
  window: WindowSize
  ram: RamInfo
  mods: Mod[]
  /** Absolute path of the instance directory */
  path: string
  /** Epoch milliseconds of the last save */
  lastModified: number
  /** Store that manages this instance. Not serialized. */
  store?: WeakRef<InstanceStore>
}

/**
 * What `InstanceStore.create` needs: a name, everything else has a default.
 */
export interface InstanceOptions {
  name: string
  /** [Optional: default is `''`] */
  description?: string
  /** [Optional: default is `'latest'`] */
  minecraftVersion?: string
  /** [Optional: default is `{ type: 'VANILLA', version: '' }`] */
  loader?: ModLoader
  /** [Optional: default is `''`] */
  javaPath?: string
  /** [Optional: default is `{ width: 854, height: 480, fullscreen: false }`] */
  window?: Partial<WindowSize>
  /** [Optional: default is `{ minimumMB: 4096, maximumMB: 4096 }`] */
  ram?: Partial<RamInfo>
  /** [Optional: default is `[]`] */
  mods?: Mod[]
}
