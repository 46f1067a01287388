import { apology } from "../commands/replies.js";

export type AccessGateOptions = {
  restrict: boolean;
  /** 표시 이름 → Slack user id. 값만 검사한다. */
  allowed_users: Readonly<Record<string, string>>;
  admin_contact: string;
};

export class AccessGate {
  private readonly restrict: boolean;
  private readonly allowed: ReadonlySet<string>;
  private readonly admin_contact: string;

  constructor(options: AccessGateOptions) {
    this.restrict = options.restrict;
    this.allowed = new Set(Object.values(options.allowed_users).map((v) => v.trim()).filter(Boolean));
    this.admin_contact = options.admin_contact;
  }

  is_allowed(user_id: string): boolean {
    if (!this.restrict) return true;
    return this.allowed.has(user_id);
  }

  denial_reply(user_id: string): string {
    return `${apology(user_id)}you're not authorized to use this bot. Contact ${this.admin_contact} for assistance.`;
  }
}
