import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { StudentAccount } from './entities/student-account.entity';
import { StudentsService } from './students.service';

@Module({
  imports: [TypeOrmModule.forFeature([StudentAccount])],
  providers: [StudentsService],
  exports: [StudentsService],
})
export class StudentsModule {}
