/**
 * Role an actor logged in with
 * - `stakeholder`: scoped to one agency, may edit that agency's activities
 * - `admin`: unrestricted read access, CSV import/export and audit log review
 */
export type ActorRole = 'stakeholder' | 'admin';

/**
 * Represents the person who performed a change
 *
 * @example
 * ```typescript
 * const actor: Actor = {
 *   name: 'Jane Doe',
 *   email: 'jane@example.org',
 *   agency: 'WHO',
 *   role: 'stakeholder',
 * };
 * ```
 */
export interface Actor {
  /** Human-readable name entered at login */
  name: string;
  /** Contact email entered at login */
  email: string;
  /** Agency the actor belongs to ('All' for admins) */
  agency: string;
  role: ActorRole;
}
