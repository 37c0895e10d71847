/**
 * VM payloads (GET config, GET status).
 */

export interface Datacenter {
  name: string;
  country: string;
  city: string;
}

export interface HostSystem {
  datacenter: Datacenter;
  name: string;
  node: string;
  processor: string;
  memory: string;
  nvme_hard_drives: string;
}

export interface Ipv4Address {
  ip_address: string;
  ip_gateway: string;
  ddos_protection: string;
  rdns: string;
}

export interface Ipv6Address {
  ip_address: string;
  ip_gateway: string;
  requires_restart: boolean;
}

export interface VmConfig {
  cores: number;
  /** Memory in MB. */
  mem: number;
  /** Disk in GB. */
  disk: number;
  os: { name: string; displayname: string };
  username: string;
  password: string;
  hostname: string;
  /** Mbit/s */
  network_speed: number;
  backup_slots: number;
  ipv4: Ipv4Address[];
  ipv6: Ipv6Address[];
}

export interface VmConfigData {
  hostsystem: HostSystem;
  config: VmConfig;
}

export interface UsageValue {
  data: string | number;
  unit: string;
}

export interface VmStatusData {
  status: 'running' | 'stopped' | string;
  /** Seconds since boot. */
  uptime: number;
  task: string | null;
  usage: {
    cpu: UsageValue;
    mem: UsageValue;
    nvme_storage: UsageValue;
  };
}
