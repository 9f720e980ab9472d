/**
 * Loaders for the bundled wordlist, port catalog and fingerprint signatures
 */

import { readFile } from 'fs/promises';
import { ConfigurationError, errorMessage } from './errors.js';
import { templatePath } from '../utils/paths.js';
import type { PortProfile, TechCategory } from './types.js';

export interface PortCatalog {
  common: number[];
  top: number[];
  services: Map<number, string>;
}

export interface BannerSignature {
  service: string;
  pattern: RegExp;
}

export interface TechSignature {
  pattern: RegExp;
  name: string;
  category: TechCategory;
}

export interface HeaderSignature extends TechSignature {
  header: string;
}

export interface WhatWebSignature {
  name: string;
  category: TechCategory;
}

export interface SignatureCatalog {
  banners: BannerSignature[];
  headers: HeaderSignature[];
  content: TechSignature[];
  cookies: TechSignature[];
  whatweb: WhatWebSignature[];
}

const TECH_CATEGORIES: readonly TechCategory[] = [
  'web_server',
  'frameworks',
  'cms',
  'programming_languages',
  'databases',
  'cdn',
  'analytics',
  'security',
  'other',
];

const portCatalogs = new Map<string, Promise<PortCatalog>>();
const signatureCatalogs = new Map<string, Promise<SignatureCatalog>>();

/**
 * Read a wordlist: one label per line, blank lines and `#` comments skipped, duplicates dropped
 */
export async function loadWordlist(path = templatePath('wordlists', 'common-subdomains.txt')): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read wordlist ${path}: ${errorMessage(error)}`, { cause: error });
  }

  const words = content
    .split('\n')
    .map((line) => line.trim().toLowerCase())
    .filter((line) => line && !line.startsWith('#'));

  return [...new Set(words)];
}

export function loadPortCatalog(path = templatePath('ports.json')): Promise<PortCatalog> {
  let catalog = portCatalogs.get(path);
  if (!catalog) {
    catalog = readJson(path)
      .then((data) => parsePortCatalog(data, path))
      .catch((error: unknown) => {
        portCatalogs.delete(path);
        throw error;
      });
    portCatalogs.set(path, catalog);
  }
  return catalog;
}

export function loadSignatures(path = templatePath('signatures.json')): Promise<SignatureCatalog> {
  let catalog = signatureCatalogs.get(path);
  if (!catalog) {
    catalog = readJson(path)
      .then((data) => parseSignatures(data, path))
      .catch((error: unknown) => {
        signatureCatalogs.delete(path);
        throw error;
      });
    signatureCatalogs.set(path, catalog);
  }
  return catalog;
}

/**
 * Port list for a run: explicit ports win over the profile
 */
export function selectPorts(catalog: PortCatalog, profile: PortProfile, explicit?: number[]): number[] {
  if (explicit && explicit.length > 0) {
    return [...new Set(explicit)].sort((a, b) => a - b);
  }

  switch (profile) {
    case 'full':
      return Array.from({ length: 65535 }, (_, index) => index + 1);
    case 'top':
      return [...new Set(catalog.top)].sort((a, b) => a - b);
    default:
      return [...new Set(catalog.common)].sort((a, b) => a - b);
  }
}

async function readJson(path: string): Promise<unknown> {
  try {
    const parsed: unknown = JSON.parse(await readFile(path, 'utf-8'));
    return parsed;
  } catch (error) {
    throw new ConfigurationError(`Cannot load ${path}: ${errorMessage(error)}`, { cause: error });
  }
}

function parsePortCatalog(data: unknown, source: string): PortCatalog {
  if (!isRecord(data)) {
    throw new ConfigurationError(`${source}: expected an object`);
  }

  const services = new Map<number, string>();
  const rawServices = data.services;
  if (isRecord(rawServices)) {
    for (const [key, value] of Object.entries(rawServices)) {
      const port = Number(key);
      if (isPort(port) && typeof value === 'string') {
        services.set(port, value);
      }
    }
  }

  return {
    common: portList(data.common, `${source}: common`),
    top: portList(data.top, `${source}: top`),
    services,
  };
}

function parseSignatures(data: unknown, source: string): SignatureCatalog {
  if (!isRecord(data)) {
    throw new ConfigurationError(`${source}: expected an object`);
  }

  const banners = records(data.banners, `${source}: banners`).map((entry) => ({
    service: stringField(entry, 'service', source),
    pattern: compile(stringField(entry, 'pattern', source), source),
  }));

  const techSignature = (entry: Record<string, unknown>): TechSignature => ({
    pattern: compile(stringField(entry, 'pattern', source), source),
    name: stringField(entry, 'name', source),
    category: categoryField(entry, source),
  });

  return {
    banners,
    headers: records(data.headers, `${source}: headers`).map((entry) => ({
      ...techSignature(entry),
      header: stringField(entry, 'header', source).toLowerCase(),
    })),
    content: records(data.content, `${source}: content`).map(techSignature),
    cookies: records(data.cookies, `${source}: cookies`).map(techSignature),
    whatweb: records(data.whatweb, `${source}: whatweb`).map((entry) => ({
      name: stringField(entry, 'name', source),
      category: categoryField(entry, source),
    })),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPort(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 65535;
}

function portList(value: unknown, label: string): number[] {
  if (!Array.isArray(value) || !value.every(isPort)) {
    throw new ConfigurationError(`${label}: expected a list of ports`);
  }
  return value;
}

function records(value: unknown, label: string): Array<Record<string, unknown>> {
  if (!Array.isArray(value) || !value.every(isRecord)) {
    throw new ConfigurationError(`${label}: expected a list of objects`);
  }
  return value;
}

function stringField(entry: Record<string, unknown>, key: string, source: string): string {
  const value = entry[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigurationError(`${source}: missing "${key}"`);
  }
  return value;
}

function categoryField(entry: Record<string, unknown>, source: string): TechCategory {
  const value = entry.category;
  const category = TECH_CATEGORIES.find((candidate) => candidate === value);
  if (!category) {
    throw new ConfigurationError(`${source}: unknown category ${String(value)}`);
  }
  return category;
}

function compile(pattern: string, source: string): RegExp {
  try {
    return new RegExp(pattern, 'i');
  } catch (error) {
    throw new ConfigurationError(`${source}: bad pattern ${pattern}: ${errorMessage(error)}`);
  }
}
