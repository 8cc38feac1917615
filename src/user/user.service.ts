import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import * as bcrypt from 'bcryptjs';
import { User } from './user.entity';
import { CreateUserDto } from './dto/create-user.dto';
import { UpdateUserDto } from './dto/update-user.dto';
import { ListUsersQuery } from './dto/list-users.query';
import { rethrowConstraintViolation } from '../common/constraint-violation';
import { bcryptRounds } from '../config/auth.config';

// Users are never hard-deleted; other tables point at them with SET NULL.
@Injectable()
export class UserService {
  private readonly logger = new Logger(UserService.name);
  private readonly rounds = bcryptRounds();

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
  ) {}

  async createUser(dto: CreateUserDto): Promise<User> {
    const user = this.userRepository.create({
      username: dto.username,
      email: dto.email,
      passwordHash: await bcrypt.hash(dto.password, this.rounds),
      fullName: dto.fullName,
      role: dto.role ?? 'receptionist',
      isActive: dto.isActive ?? true,
    });
    const saved = await this.userRepository.save(user).catch(rethrowConstraintViolation);
    this.logger.log(`Provisioned user ${saved.id} (${saved.role})`);
    return this.getUser(saved.id);
  }

  async getUsers(query: ListUsersQuery = {}): Promise<User[]> {
    const where: FindOptionsWhere<User> = {};
    if (query.role !== undefined) where.role = query.role;
    if (query.active !== undefined) where.isActive = query.active;
    return this.userRepository.find({ where, order: { username: 'ASC' } });
  }

  async getUser(id: number): Promise<User> {
    const user = await this.userRepository.findOne({ where: { id } });
    if (!user) throw new NotFoundException('User not found');
    return user;
  }

  async updateUser(id: number, dto: UpdateUserDto): Promise<User> {
    const user = await this.getUser(id);
    if (dto.username !== undefined) user.username = dto.username;
    if (dto.email !== undefined) user.email = dto.email;
    if (dto.fullName !== undefined) user.fullName = dto.fullName;
    if (dto.role !== undefined) user.role = dto.role;
    if (dto.password !== undefined) user.passwordHash = await bcrypt.hash(dto.password, this.rounds);
    await this.userRepository.save(user).catch(rethrowConstraintViolation);
    return this.getUser(id);
  }

  async setActive(id: number, isActive: boolean): Promise<User> {
    const user = await this.getUser(id);
    user.isActive = isActive;
    await this.userRepository.save(user);
    this.logger.log(`User ${id} ${isActive ? 'reactivated' : 'deactivated'}`);
    return this.getUser(id);
  }
}
