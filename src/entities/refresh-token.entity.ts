import { Column, CreateDateColumn, Entity, Index, JoinColumn, ManyToOne, PrimaryColumn } from 'typeorm';
import { Owner } from './owner.entity';

@Entity({ name: 'refresh_token' })
export class RefreshToken {
    @PrimaryColumn({ name: 'jti', length: 64 })
    jti!: string;

    @ManyToOne(() => Owner, { onDelete: 'CASCADE' })
    @JoinColumn({ name: 'owner_id' })
    owner!: Owner;

    @Column({ name: 'owner_id' })
    @Index()
    ownerId!: string;

    @Column({ name: 'expires_at', type: 'datetime' })
    expiresAt!: Date;

    @CreateDateColumn({ name: 'created_at', type: 'datetime' })
    createdAt!: Date;
}
