import { Column, Entity, Index, OneToMany, PrimaryColumn } from 'typeorm';
import type { Snippet } from '../Snippet';

@Entity()
export class User {
  @PrimaryColumn({ length: 36, primaryKeyConstraintName: 'PK_user_id' })
  id!: string;

  @Column({ type: 'text' })
  @Index('IDX_user_username_unique', { unique: true })
  username!: string;

  @Column({ type: 'text', nullable: true })
  name!: string | null;

  @Column({ type: 'timestamp', default: () => 'now()' })
  createdAt!: Date;

  @OneToMany('Snippet', (snippet: Snippet) => snippet.owner, { lazy: true })
  snippets!: Promise<Snippet[]>;
}
