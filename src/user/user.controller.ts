import { Body, Controller, Get, Param, ParseIntPipe, Patch, Post, Query } from '@nestjs/common';
import { UserService } from './user.service';
import { CreateUserDto } from './dto/create-user.dto';
import { UpdateUserDto } from './dto/update-user.dto';
import { ListUsersQuery } from './dto/list-users.query';

@Controller('api/users')
export class UserController {
  constructor(private readonly userService: UserService) {}

  @Post()
  async createUser(@Body() dto: CreateUserDto) {
    return this.userService.createUser(dto);
  }

  @Get()
  async getUsers(@Query() query: ListUsersQuery) {
    return this.userService.getUsers(query);
  }

  @Get(':id')
  async getUser(@Param('id', ParseIntPipe) id: number) {
    return this.userService.getUser(id);
  }

  @Patch(':id')
  async updateUser(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateUserDto) {
    return this.userService.updateUser(id, dto);
  }

  /**
   * Soft delete: the account stays referenced by appointments and invoices.
   * POST /api/users/:id/deactivate
   */
  @Post(':id/deactivate')
  async deactivateUser(@Param('id', ParseIntPipe) id: number) {
    return this.userService.setActive(id, false);
  }

  @Post(':id/reactivate')
  async reactivateUser(@Param('id', ParseIntPipe) id: number) {
    return this.userService.setActive(id, true);
  }
}
