import { CreateDateColumn, Entity, PrimaryColumn } from 'typeorm';

/** Membership by reviewer login; a login may belong to several teams. */
@Entity('team_members')
export class TeamMemberEntity {
  @PrimaryColumn()
  teamId!: number;

  @PrimaryColumn()
  login!: string;

  @CreateDateColumn()
  joinedAt!: Date;
}
