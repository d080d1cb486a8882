/**
 * @summary QEMU options for SEV-SNP guests, in launch order.
 *
 * The base options boot a plain VM from the disk image (used for first-boot
 * provisioning). The SNP options switch on memory encryption and boot the
 * measured firmware, kernel and initrd directly.
 */

import path from "node:path";
import type { GuestConfig } from "@snpctl/core";
import { BootParameterSet, type BootParameter } from "./boot-parameters.js";

export interface BaseLaunchOptions {
  guest: GuestConfig;
  image: string;
  /** Directory receiving qemu.log, qemu-trace.log and the pidfile */
  launchDir: string;
  /** Attach this cloud-init seed image as a second disk */
  seedImage?: string;
}

export interface SnpLaunchOptions {
  /** Build for the UPM (memfd-backed private memory) stack */
  upm: boolean;
  memSizeMb: number;
  firmware: string;
  initrd: string;
  kernel: string;
  append: string;
}

export const QEMU_LOG = "qemu.log";
export const QEMU_TRACE_LOG = "qemu-trace.log";
export const QEMU_PIDFILE = "qemu.pid";

export function baseParameters(options: BaseLaunchOptions): BootParameter[] {
  const { guest, image, launchDir } = options;
  const params: BootParameter[] = [
    ["--enable-kvm"],
    ["-cpu", guest.cpuModel],
    ["-machine", "q35"],
    ["-smp", String(guest.smp)],
    ["-m", `${guest.memSizeMb}M`],
    ["-no-reboot"],
    ["-vga", "std"],
    ["-monitor", "pty"],
    ["-daemonize"],
    ["-pidfile", path.join(launchDir, QEMU_PIDFILE)],

    // Networking
    ["-netdev", `user,hostfwd=tcp::${guest.hostSshPort}-:22,id=vmnic`],
    ["-device", "virtio-net-pci,disable-legacy=on,iommu_platform=true,netdev=vmnic,romfile="],

    // Storage
    ["-device", "virtio-scsi-pci,id=scsi0,disable-legacy=on,iommu_platform=true"],
    ["-device", "scsi-hd,drive=disk0"],
    ["-drive", `if=none,id=disk0,format=qcow2,file=${image}`],
  ];

  if (options.seedImage) {
    params.push(
      ["-device", "scsi-hd,drive=disk1"],
      ["-drive", `if=none,id=disk1,format=raw,file=${options.seedImage}`]
    );
  }

  params.push(
    // Serial console and trace logging; firmware debug output goes to the serial log
    ["-serial", `file:${path.join(launchDir, QEMU_LOG)}`],
    ["--trace", "kvm_sev*"],
    ["-D", path.join(launchDir, QEMU_TRACE_LOG)],
    ["-global", "isa-debugcon.iobase=0x402"]
  );

  return params;
}

export function snpParameters(options: SnpLaunchOptions): BootParameter[] {
  const params: BootParameter[] = [["-machine", "memory-encryption=sev0,vmport=off"]];

  if (options.upm) {
    params.push(
      [
        "-object",
        `memory-backend-memfd,id=ram1,size=${options.memSizeMb}M,share=true,prealloc=false`,
      ],
      ["-machine", "memory-backend=ram1"]
    );
  }

  params.push(
    ["-object", "sev-snp-guest,id=sev0,cbitpos=51,reduced-phys-bits=1,kernel-hashes=on"],
    ["-bios", options.firmware],
    ["-initrd", options.initrd],
    ["-kernel", options.kernel],
    ["-append", options.append]
  );

  return params;
}

/**
 * Write a fresh command file containing `params`, appending one at a time.
 */
export async function writeQemuCommand(
  commandFile: string,
  qemuBin: string,
  params: readonly BootParameter[]
): Promise<BootParameterSet> {
  const set = await BootParameterSet.create(commandFile, qemuBin);
  for (const param of params) {
    await set.append(...param);
  }
  return set;
}
