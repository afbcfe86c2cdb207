import { Column, Entity } from 'typeorm';
import { BaseEntity } from './base.entity';

@Entity({ name: 'owner' })
export class Owner extends BaseEntity {
    @Column({ name: 'username', length: 80, unique: true })
    username!: string;

    @Column({ name: 'email', length: 120, unique: true })
    email!: string;

    @Column({ name: 'password_hash', length: 200 })
    passwordHash!: string;

    @Column({ name: 'phone', type: 'varchar', length: 20, nullable: true })
    phone!: string | null;
}
