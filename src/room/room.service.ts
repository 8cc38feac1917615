import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Room } from './room.entity';
import { CreateRoomDto } from './dto/create-room.dto';
import { UpdateRoomDto } from './dto/update-room.dto';
import { rethrowConstraintViolation } from '../common/constraint-violation';

@Injectable()
export class RoomService {
  constructor(
    @InjectRepository(Room)
    private readonly roomRepository: Repository<Room>,
  ) {}

  async createRoom(dto: CreateRoomDto): Promise<Room> {
    const room = this.roomRepository.create({
      name: dto.name,
      description: dto.description ?? null,
      capacity: dto.capacity ?? 1,
    });
    return this.roomRepository.save(room).catch(rethrowConstraintViolation);
  }

  async getRooms(): Promise<Room[]> {
    return this.roomRepository.find({ order: { name: 'ASC' } });
  }

  async getRoom(id: number): Promise<Room> {
    const room = await this.roomRepository.findOne({ where: { id } });
    if (!room) throw new NotFoundException('Room not found');
    return room;
  }

  async updateRoom(id: number, update: UpdateRoomDto): Promise<Room> {
    const room = await this.getRoom(id);
    Object.assign(room, update);
    return this.roomRepository.save(room).catch(rethrowConstraintViolation);
  }

  // Appointments booked in the room keep their row with room_id cleared.
  async deleteRoom(id: number): Promise<{ message: string }> {
    await this.getRoom(id);
    await this.roomRepository.delete(id);
    return { message: 'Room deleted' };
  }
}
