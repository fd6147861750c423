/**
 * Load and save a TrackingSetup as a JSON file.
 *
 * File layout: { "version": 1, "name": "...", "cameras": [CameraDto, ...] }
 */

import { readFile, writeFile } from 'fs/promises'
import { TrackingSetup } from '../entities/tracking-setup'
import { SetupFileError } from '../estimation/errors'
import { log } from '../estimation/estimation-logger'
import { validateSetupDto } from '../validation/validator'

function errorToMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Parse and validate setup JSON. Validation warnings are logged.
 *
 * @throws SetupFileError on malformed JSON or invalid content
 */
export function loadSetupFromJson(json: string): TrackingSetup {
  let raw: unknown
  try {
    raw = JSON.parse(json)
  } catch (error) {
    throw new SetupFileError('Setup is not valid JSON', [errorToMessage(error)])
  }

  const result = validateSetupDto(raw)
  for (const warning of result.warnings) {
    log(`[Setup] WARNING: ${warning.entityId ?? 'setup'}: ${warning.message}`)
  }
  if (!result.isValid || !result.dto) {
    throw new SetupFileError(
      result.summary,
      result.errors.map(e => (e.entityId ? `${e.entityId}: ${e.message}` : e.message))
    )
  }

  return TrackingSetup.deserialize(result.dto)
}

export function saveSetupToJson(setup: TrackingSetup): string {
  return JSON.stringify(setup.serialize(), null, 2)
}

export async function loadSetupFile(path: string): Promise<TrackingSetup> {
  let json: string
  try {
    json = await readFile(path, 'utf-8')
  } catch (error) {
    throw new SetupFileError(`Cannot read setup file ${path}`, [errorToMessage(error)])
  }
  const setup = loadSetupFromJson(json)
  log(`[Setup] Loaded ${setup.size} cameras from ${path}`)
  return setup
}

export async function saveSetupFile(path: string, setup: TrackingSetup): Promise<void> {
  await writeFile(path, saveSetupToJson(setup) + '\n', 'utf-8')
}
