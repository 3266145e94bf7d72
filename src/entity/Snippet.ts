import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import type { User } from './user';

@Entity()
@Index('IDX_snippet_created_id', ['created', 'id'])
@Index('IDX_snippet_owner_id', ['ownerId'])
export class Snippet {
  @PrimaryGeneratedColumn('increment', {
    primaryKeyConstraintName: 'PK_snippet_id',
  })
  id!: number;

  @Column({ type: 'timestamp', default: () => 'now()', update: false })
  created!: Date;

  @Column({ type: 'text', default: '' })
  title!: string;

  @Column({ type: 'text' })
  code!: string;

  @Column({ type: 'boolean', default: false })
  linenos!: boolean;

  @Column({ type: 'text', default: 'python' })
  language!: string;

  @Column({ type: 'text', default: 'friendly' })
  style!: string;

  // Derived from the fields above on every write
  @Column({ type: 'text' })
  highlighted!: string;

  @Column({ length: 36, update: false })
  ownerId!: string;

  @ManyToOne('User', (user: User) => user.snippets, {
    lazy: true,
    onDelete: 'CASCADE',
  })
  @JoinColumn({
    name: 'ownerId',
    foreignKeyConstraintName: 'FK_snippet_owner_id',
  })
  owner!: Promise<User>;
}
