import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import * as bcrypt from 'bcrypt';
import {
  Actor,
  assertRole,
  AuthenticationError,
  ConflictError,
  NotFoundError,
  UserRole,
  ValidationError,
} from '@gemhouse/shared';
import { AUCTION_STORE, AuctionStore } from '../../database/auction-store';
import { User } from './entities/user.entity';

export interface JwtPayload {
  sub: string;
  email: string;
  role: UserRole;
}

export interface RegisterInput {
  email: string;
  password: string;
  name: string;
  phone?: string;
}

export interface PublicUser {
  id: string;
  email: string;
  name: string;
  role: UserRole;
  isActive: boolean;
}

export const MIN_PASSWORD_LENGTH = 8;

function toPublic(user: User): PublicUser {
  return { id: user.id, email: user.email, name: user.name, role: user.role, isActive: user.isActive };
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);
  private readonly bcryptRounds: number;

  constructor(
    @Inject(AUCTION_STORE) private readonly store: AuctionStore,
    private readonly jwtService: JwtService,
    private readonly config: ConfigService,
  ) {
    this.bcryptRounds = this.config.get<number>('BCRYPT_ROUNDS') ?? 12;
  }

  async register(input: RegisterInput): Promise<PublicUser> {
    const email = input.email.trim().toLowerCase();
    const name = input.name.trim();
    if (name.length === 0) {
      throw new ValidationError('name must not be empty', { field: 'name' });
    }
    if (input.password.length < MIN_PASSWORD_LENGTH) {
      throw new ValidationError(`password must be at least ${MIN_PASSWORD_LENGTH} characters`, {
        field: 'password',
      });
    }

    const existing = await this.store.manager.findOne(User, { email });
    if (existing) {
      throw new ConflictError('Email already registered', 'DUPLICATE_EMAIL');
    }

    const passwordHash = await bcrypt.hash(input.password, this.bcryptRounds);

    let user: User;
    try {
      user = await this.store.manager.insert(User, {
        email,
        name,
        passwordHash,
        role: UserRole.MEMBER,
        phone: input.phone ?? null,
        address: null,
        isActive: true,
        lastLoginAt: null,
      });
    } catch (err) {
      if (err instanceof ConflictError) {
        throw new ConflictError('Email already registered', 'DUPLICATE_EMAIL');
      }
      throw err;
    }

    this.logger.log(JSON.stringify({ event: 'user_registered', user_id: user.id }));
    return toPublic(user);
  }

  async login(email: string, password: string): Promise<{ accessToken: string; user: PublicUser }> {
    const user = await this.store.manager.findOne(User, { email: email.trim().toLowerCase() });
    if (!user) {
      throw new AuthenticationError('INVALID_CREDENTIALS', 'Invalid credentials');
    }

    if (!user.isActive) {
      throw new AuthenticationError('ACCOUNT_DEACTIVATED', 'Account is deactivated');
    }

    const valid = await bcrypt.compare(password, user.passwordHash);
    if (!valid) {
      throw new AuthenticationError('INVALID_CREDENTIALS', 'Invalid credentials');
    }

    user.lastLoginAt = new Date();
    await this.store.manager.save(user);

    const payload: JwtPayload = { sub: user.id, email: user.email, role: user.role };
    const accessToken = await this.jwtService.signAsync(payload);
    return { accessToken, user: toPublic(user) };
  }

  async findById(id: string): Promise<PublicUser> {
    return toPublic(await this.requireUser(id));
  }

  async changeRole(actor: Actor, userId: string, role: UserRole): Promise<PublicUser> {
    assertRole(actor, UserRole.ADMIN, 'Changing roles');
    const user = await this.requireUser(userId);
    const from = user.role;
    user.role = role;
    const saved = await this.store.manager.save(user);
    this.logger.log(
      JSON.stringify({ event: 'user_role_changed', user_id: userId, from, to: role, actor_id: actor.userId }),
    );
    return toPublic(saved);
  }

  /** Users are never deleted; deactivation blocks login. */
  async deactivate(actor: Actor, userId: string): Promise<PublicUser> {
    assertRole(actor, UserRole.ADMIN, 'Deactivating users');
    const user = await this.requireUser(userId);
    user.isActive = false;
    const saved = await this.store.manager.save(user);
    this.logger.log(JSON.stringify({ event: 'user_deactivated', user_id: userId, actor_id: actor.userId }));
    return toPublic(saved);
  }

  private async requireUser(id: string): Promise<User> {
    const user = await this.store.manager.findOne(User, { id });
    if (!user) {
      throw new NotFoundError('User', id);
    }
    return user;
  }
}
