/**
 * Ansible YAML inventory reading
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';

import { extractErrorMessage } from '@/lib/errors';
import { Failure, Success, type Result } from '@/types';

export interface InventoryHost {
  /** Innermost group declaring the host */
  group: string;
  name: string;
  /** `ansible_host`, when set */
  address?: string;
}

const IPV4 = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isIPv4(value: string): boolean {
  const match = IPV4.exec(value);
  return match !== null && match.slice(1).every((octet) => Number(octet) <= 255);
}

export async function loadInventory(inventoryFile: string): Promise<Result<unknown>> {
  try {
    return Success(yaml.load(await readFile(inventoryFile, 'utf-8')));
  } catch (error) {
    return Failure(`Cannot read inventory ${inventoryFile}: ${extractErrorMessage(error)}`, {
      code: 'CONFIG_ERROR',
      message: 'Inventory could not be read',
      resolution: `Check that ${inventoryFile} exists and is valid YAML`,
    });
  }
}

function visitGroup(group: string, node: unknown, hosts: InventoryHost[]): void {
  if (!isRecord(node)) return;

  if (isRecord(node.hosts)) {
    for (const [name, vars] of Object.entries(node.hosts)) {
      const host: InventoryHost = { group, name };
      if (isRecord(vars) && vars.ansible_host !== undefined && vars.ansible_host !== null) {
        host.address = String(vars.ansible_host);
      }
      hosts.push(host);
    }
  }

  if (isRecord(node.children)) {
    for (const [child, childNode] of Object.entries(node.children)) {
      visitGroup(child, childNode, hosts);
    }
  }
}

/**
 * Flatten every `hosts:` entry of an inventory
 */
export function collectInventoryHosts(inventory: unknown): InventoryHost[] {
  const hosts: InventoryHost[] = [];
  if (isRecord(inventory)) {
    for (const [group, node] of Object.entries(inventory)) {
      visitGroup(group, node, hosts);
    }
  }
  return hosts;
}

function findGroup(name: string, node: unknown): unknown {
  if (!isRecord(node)) return undefined;
  if (name in node) return node[name];
  for (const value of Object.values(node)) {
    if (!isRecord(value) || !isRecord(value.children)) continue;
    const found = findGroup(name, value.children);
    if (found !== undefined) return found;
  }
  return undefined;
}

/**
 * Number of distinct hosts in `group` and its child groups, or undefined
 * when the inventory does not declare the group
 */
export function countGroupHosts(inventory: unknown, group: string): number | undefined {
  const node = findGroup(group, inventory);
  if (node === undefined) return undefined;

  const hosts: InventoryHost[] = [];
  visitGroup(group, node, hosts);
  return new Set(hosts.map((host) => host.name)).size;
}

/**
 * Pick the bastion address: the `bastion-node` host, then a host of (or
 * named) `bastion`, then the first host with an IPv4 `ansible_host`
 */
export function extractBastionHost(inventory: unknown): string | undefined {
  const hosts = collectInventoryHosts(inventory).filter(
    (host): host is InventoryHost & { address: string } => host.address !== undefined,
  );

  const bastionNode = hosts.find((host) => host.name === 'bastion-node');
  if (bastionNode) return bastionNode.address;

  const bastion = hosts.find((host) => host.group === 'bastion' || host.name === 'bastion');
  if (bastion) return bastion.address;

  return hosts.find((host) => isIPv4(host.address))?.address;
}
