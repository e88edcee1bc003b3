/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import fs from 'node:fs/promises'
import { existsSync } from 'node:fs'
import path_ from 'node:path'
import { v4 } from 'uuid'
import type { InstanceStoreConfig } from '../../types/config'
import type { InstanceEvents } from '../../types/events'
import type { InstanceModel, InstanceOptions, Mod } from '../../types/instance'
import { LauncherKitError, ErrorType } from '../../types/errors'
import EventEmitter from '../utils/events'
import { parseJson } from '../utils/http'
import { instanceFileSchema, type InstanceFile } from './schema'

const INSTANCE_FILE = 'instance.json'
const ILLEGAL_CHARS = /[<>:"/\\|?*\x00-\x1f]/g

/**
 * Manages the instances stored in a folder: one sub-folder per instance, each holding an
 * `instance.json`.
 *
 * Not safe for concurrent use: the in-memory index and the files are updated without locking.
 */
export default class InstanceStore extends EventEmitter<InstanceEvents> {
  readonly root: string
  private readonly instances = new Map<string, InstanceModel>()

  /**
   * @param config The configuration of the store.
   */
  constructor(config: InstanceStoreConfig) {
    super()
    this.root = path_.resolve(config.root)
  }

  /**
   * Create an instance: allocate its ID and its folder, then save it.
   *
   * The folder is named after the instance; if a file or folder with the same name (case-insensitive)
   * already exists, ` (1)`, ` (2)`... is appended.
   * @param options The instance settings. Only `name` is required.
   * @returns The created instance.
   */
  async create(options: InstanceOptions): Promise<InstanceModel> {
    if (!options.name.trim()) throw new LauncherKitError(ErrorType.INSTANCE_ERROR, 'An instance needs a name')

    const instance: InstanceModel = {
      id: v4(),
      name: options.name,
      description: options.description ?? '',
      minecraftVersion: options.minecraftVersion ?? 'latest',
      loader: options.loader ?? { type: 'VANILLA', version: '' },
      javaPath: options.javaPath ?? '',
      window: {
        width: options.window?.width ?? 854,
        height: options.window?.height ?? 480,
        fullscreen: options.window?.fullscreen ?? false
      },
      ram: {
        minimumMB: options.ram?.minimumMB ?? 4096,
        maximumMB: options.ram?.maximumMB ?? 4096
      },
      mods: [...(options.mods ?? [])],
      path: '',
      lastModified: 0
    }
    this.validate(instance)

    const path = await this.allocateFolder(options.name)
    instance.path = path

    await this.save(instance.id, instance)
    this.emit('instance_created', { id: instance.id, name: instance.name, path })
    return instance
  }

  /**
   * Save an instance to `<instance.path>/instance.json` and update `lastModified`.
   * @param id The ID the instance is registered under.
   * @param instance The instance to save.
   * @returns The saved instance.
   * @throws {LauncherKitError} `INSTANCE_ERROR` if the instance could not be loaded back (eg. a RAM
   * amount that is not a positive integer). Nothing is written then.
   */
  async save(id: string, instance: InstanceModel): Promise<InstanceModel> {
    const file = path_.join(instance.path, INSTANCE_FILE)
    this.emit('instance_debug', `Saving instance to file: ${file}`)

    const data = this.validate({ ...instance, lastModified: Math.max(Date.now(), instance.lastModified) })
    instance.store = new WeakRef(this)
    instance.lastModified = data.lastModified
    this.instances.set(id, instance)

    try {
      await fs.writeFile(file, JSON.stringify(data, null, 2), 'utf-8')
    } catch (err: unknown) {
      throw new LauncherKitError(ErrorType.FILE_ERROR, `Unable to save instance ${instance.name} to ${file}: ${err instanceof Error ? err.message : err}`)
    }

    this.emit('instance_saved', { id, path: instance.path })
    return instance
  }

  /**
   * Forget the loaded instances and load every `instance.json` found in the store folder (recursively).
   * Files that cannot be loaded are skipped and reported with the `instance_load_error` event.
   * @returns The loaded instances.
   */
  async loadAll(): Promise<InstanceModel[]> {
    this.instances.clear()
    await this.ensureRoot()

    let files: string[]
    try {
      files = await this.browse(this.root)
    } catch (err: unknown) {
      throw new LauncherKitError(ErrorType.FILE_ERROR, `Unable to read the instances folder ${this.root}: ${err instanceof Error ? err.message : err}`)
    }
    for (const file of files) {
      this.emit('instance_debug', `Attempting to load instance from file: ${file}`)
      try {
        const instance = await this.read(file)
        const loaded = this.instances.get(instance.id)
        if (loaded) {
          this.emit('instance_load_error', { path: file, message: `Duplicate instance ID ${instance.id}: already loaded from ${loaded.path}` })
          continue
        }
        this.instances.set(instance.id, instance)
      } catch (err: unknown) {
        this.emit('instance_load_error', { path: file, message: err instanceof Error ? err.message : String(err) })
      }
    }

    this.emit('instance_loaded', { amount: this.instances.size })
    return this.all()
  }

  /**
   * Load the instance stored in a folder, replacing any loaded instance with the same ID.
   * @param path The instance folder.
   * @returns The instance, or `null` if the folder has no `instance.json`.
   * @throws {LauncherKitError} `INSTANCE_ERROR` if the file is not a valid instance.
   */
  async loadOne(path: string): Promise<InstanceModel | null> {
    const file = path_.join(path_.resolve(path), INSTANCE_FILE)
    if (!existsSync(file)) return null

    const instance = await this.read(file)
    this.instances.set(instance.id, instance)
    return instance
  }

  /**
   * Append a mod to an instance and save it.
   */
  async addMod(instance: InstanceModel, mod: Mod) {
    instance.mods = [...instance.mods, mod]
    return await this.save(instance.id, instance)
  }

  all() {
    return [...this.instances.values()]
  }

  byName(name: string) {
    return this.all().filter((i) => i.name === name)
  }

  /**
   * @throws {LauncherKitError} `INSTANCE_NOT_FOUND` if no instance has this name.
   */
  firstByName(name: string) {
    const instance = this.all().find((i) => i.name === name)
    if (!instance) throw new LauncherKitError(ErrorType.INSTANCE_NOT_FOUND, `No instance named '${name}'`)
    return instance
  }

  /**
   * @throws {LauncherKitError} `INSTANCE_NOT_FOUND` if no instance has this ID.
   */
  byId(id: string) {
    const instance = this.instances.get(id)
    if (!instance) throw new LauncherKitError(ErrorType.INSTANCE_NOT_FOUND, `No instance with ID ${id}`)
    return instance
  }

  exists(name: string) {
    return this.all().some((i) => i.name === name)
  }

  private async allocateFolder(name: string) {
    await this.ensureRoot()

    let base = name.replace(ILLEGAL_CHARS, '-').replace(/[. ]+$/, '')
    if (!base || base === '.' || base === '..') base = 'instance'

    let entries: string[]
    try {
      entries = await fs.readdir(this.root)
    } catch (err: unknown) {
      throw new LauncherKitError(ErrorType.FILE_ERROR, `Unable to read the instances folder ${this.root}: ${err instanceof Error ? err.message : err}`)
    }
    const taken = new Set(entries.map((entry) => entry.toLowerCase()))
    let dirname = base
    let index = 0
    while (taken.has(dirname.toLowerCase())) {
      index++
      dirname = `${base} (${index})`
    }

    const path = path_.join(this.root, dirname)
    try {
      await fs.mkdir(path)
    } catch (err: unknown) {
      throw new LauncherKitError(ErrorType.FILE_ERROR, `Unable to create the instance folder ${path}: ${err instanceof Error ? err.message : err}`)
    }
    return path
  }

  private async ensureRoot() {
    try {
      await fs.mkdir(this.root, { recursive: true })
    } catch (err: unknown) {
      throw new LauncherKitError(ErrorType.FILE_ERROR, `Unable to create the instances folder ${this.root}: ${err instanceof Error ? err.message : err}`)
    }
  }

  private async read(file: string): Promise<InstanceModel> {
    let content: string
    try {
      content = await fs.readFile(file, 'utf-8')
    } catch (err: unknown) {
      throw new LauncherKitError(ErrorType.FILE_ERROR, `Unable to read ${file}: ${err instanceof Error ? err.message : err}`)
    }

    const data = parseJson(content, instanceFileSchema)
    if (!data) throw new LauncherKitError(ErrorType.INSTANCE_ERROR, `${file} is not a valid instance file`)

    return { ...data, path: path_.dirname(file), store: new WeakRef(this) }
  }

  private validate(instance: InstanceModel): InstanceFile {
    const parsed = instanceFileSchema.safeParse(this.serialize(instance))
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ')
      throw new LauncherKitError(ErrorType.INSTANCE_ERROR, `Invalid instance ${instance.name}: ${issues}`)
    }
    return parsed.data
  }

  private serialize(instance: InstanceModel): InstanceFile {
    return {
      id: instance.id,
      name: instance.name,
      description: instance.description,
      minecraftVersion: instance.minecraftVersion,
      loader: instance.loader,
      javaPath: instance.javaPath,
      window: instance.window,
      ram: instance.ram,
      mods: instance.mods,
      path: instance.path,
      lastModified: instance.lastModified
    }
  }

  /**
   * List the instance files under `dir`. Sub-folders that cannot be read are reported with
   * `instance_load_error` and skipped; only a failure on `dir` itself is thrown.
   */
  private async browse(dir: string): Promise<string[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true })
    const found = await Promise.all(
      entries.map(async (entry) => {
        const fullPath = path_.join(dir, entry.name)
        if (entry.isDirectory()) {
          try {
            return await this.browse(fullPath)
          } catch (err: unknown) {
            this.emit('instance_load_error', { path: fullPath, message: `Unable to read ${fullPath}: ${err instanceof Error ? err.message : err}` })
            return []
          }
        }
        return entry.isFile() && entry.name === INSTANCE_FILE ? [fullPath] : []
      })
    )
    return found.flat().sort()
  }
}
