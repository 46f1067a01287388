import type { VmInstance } from "../../cloud/types.js";
import { apology } from "../replies.js";

export function format_vm_line(vm: VmInstance): string {
  const parts = [`*${vm.name || vm.id}*`, `id=${vm.id}`, `state=${vm.state}`];
  if (vm.type) parts.push(`type=${vm.type}`);
  if (vm.public_ip) parts.push(`ip=${vm.public_ip}`);
  if (vm.launched_at) parts.push(`launched=${vm.launched_at}`);
  return `• ${parts.join(" ")}`;
}

export function invalid_params_reply(user_id: string, command: string, problems: readonly string[]): string {
  return `${apology(user_id)}\`${command}\` could not run: ${problems.join("; ")}. Try \`${command} --help\`.`;
}
