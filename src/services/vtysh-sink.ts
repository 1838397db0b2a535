/**
 * vtysh routing sink.
 *
 * Drives Quagga/FRR on each router through `vtysh -c ...` over SSH. Nodes with
 * no router configured (and every node in a dry run) are journaled as
 * `simulated`; a non-zero exit or an SSH error is reported as `failed`.
 * Commands to one router share a single SSH session.
 */

import type { Config } from '../config.js';
import type { NodeId, RouteChange, SinkResult } from '../types.js';
import type { RoutingSink } from './routing-sink.js';
import { SshPool, type CommandExecutor, type SshSettings } from './ssh.js';
import { log } from '../logger.js';

export type VtyshSettings = SshSettings & Pick<Config, 'routers' | 'interfaceTemplate' | 'vtyshPath' | 'dryRun'>;

/** `vtysh -c 'configure terminal' -c '...'` */
export function vtyshCommand(vtyshPath: string, lines: string[]): string {
  return [vtyshPath, ...lines.map(line => `-c '${line}'`)].join(' ');
}

export function interfaceName(template: string, nodeId: NodeId, peerId: NodeId): string {
  return template.replace('{peer}', String(peerId)).replace('{node}', String(nodeId));
}

export function linkStateLines(iface: string, up: boolean): string[] {
  return ['configure terminal', `interface ${iface}`, up ? 'no shutdown' : 'shutdown'];
}

/** ADD installs a static route and redistributes it into OSPF; UPDATE replaces it */
export function routeChangeLines(change: RouteChange): string[] {
  const withdraw = `no ip route ${change.prefix} ${change.nexthop}`;
  if (change.operation === 'DELETE') {
    return ['configure terminal', withdraw];
  }
  return [
    'configure terminal',
    ...(change.operation === 'UPDATE' ? [withdraw] : []),
    `ip route ${change.prefix} ${change.nexthop} ${change.metric}`,
    'router ospf',
    'redistribute static',
  ];
}

/** Flush the LSDB and bounce the area type so SPF reruns from a clean base */
export const CONVERGENCE_LINES = [
  'clear ip ospf database',
  'configure terminal',
  'router ospf',
  'area 0.0.0.0 stub',
  'no area 0.0.0.0 stub',
];

export class VtyshSink implements RoutingSink {
  readonly name = 'vtysh';
  private hosts: Map<NodeId, string>;

  constructor(
    private readonly config: VtyshSettings,
    private readonly executor: CommandExecutor = new SshPool(config),
  ) {
    this.hosts = new Map(config.routers.map(r => [r.nodeId, r.host]));
  }

  async setLinkAdminState(nodeId: NodeId, peerId: NodeId, up: boolean): Promise<SinkResult> {
    const iface = interfaceName(this.config.interfaceTemplate, nodeId, peerId);
    return this.run(nodeId, linkStateLines(iface, up));
  }

  async applyRouteChange(nodeId: NodeId, change: RouteChange): Promise<SinkResult> {
    return this.run(nodeId, routeChangeLines(change));
  }

  async triggerConvergence(nodeIds: NodeId[]): Promise<SinkResult> {
    const results: SinkResult[] = [];
    for (const nodeId of nodeIds) {
      results.push(await this.run(nodeId, CONVERGENCE_LINES));
    }

    const command = `converge ${nodeIds.length} nodes`;
    const failures = results.filter(r => r.status === 'failed');
    if (failures.length > 0) {
      return {
        status: 'failed',
        command,
        error: `${failures.length}/${results.length} nodes failed: ${failures.map(f => f.error ?? 'unknown error').join('; ')}`,
      };
    }
    return {
      status: results.some(r => r.status === 'applied') ? 'applied' : 'simulated',
      command,
    };
  }

  /** Close the SSH sessions to every router */
  async close(): Promise<void> {
    await this.executor.close();
  }

  private async run(nodeId: NodeId, lines: string[]): Promise<SinkResult> {
    const command = vtyshCommand(this.config.vtyshPath, lines);
    const host = this.hosts.get(nodeId);

    if (!host || this.config.dryRun) {
      return { status: 'simulated', command };
    }

    try {
      const result = await this.executor.exec(host, command);
      if (result.code !== 0) {
        return {
          status: 'failed',
          command,
          error: `exit ${result.code} on ${host}: ${result.stderr || result.stdout}`,
        };
      }
      return { status: 'applied', command };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log(`[Vtysh] Node ${nodeId} (${host}) unreachable: ${message}`);
      return { status: 'failed', command, error: message };
    }
  }
}
