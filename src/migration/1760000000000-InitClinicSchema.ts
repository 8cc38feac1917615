import { MigrationInterface, QueryRunner } from "typeorm";

export class InitClinicSchema1760000000000 implements MigrationInterface {
    name = 'InitClinicSchema1760000000000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TYPE "users_role_enum" AS ENUM('admin', 'receptionist', 'doctor', 'nurse', 'pharmacist', 'accountant')`);
        await queryRunner.query(`CREATE TYPE "patients_gender_enum" AS ENUM('male', 'female', 'other')`);
        await queryRunner.query(`CREATE TYPE "appointments_status_enum" AS ENUM('scheduled', 'checked_in', 'in_progress', 'completed', 'cancelled', 'no_show')`);
        await queryRunner.query(`CREATE TYPE "invoices_status_enum" AS ENUM('pending', 'paid', 'void')`);

        await queryRunner.query(`CREATE TABLE "users" ("user_id" SERIAL NOT NULL, "username" character varying(50) NOT NULL, "email" character varying(255) NOT NULL, "password_hash" character varying(255) NOT NULL, "full_name" character varying(200) NOT NULL, "role" "users_role_enum" NOT NULL DEFAULT 'receptionist', "is_active" boolean NOT NULL DEFAULT true, "created_at" TIMESTAMP NOT NULL DEFAULT now(), "updated_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "UQ_users_username" UNIQUE ("username"), CONSTRAINT "UQ_users_email" UNIQUE ("email"), CONSTRAINT "PK_users" PRIMARY KEY ("user_id"))`);
        await queryRunner.query(`CREATE TABLE "patients" ("patient_id" SERIAL NOT NULL, "first_name" character varying(100) NOT NULL, "last_name" character varying(100) NOT NULL, "national_id" character varying(50), "date_of_birth" date, "gender" "patients_gender_enum" DEFAULT 'other', "phone" character varying(30), "email" character varying(255), "address" text, "emergency_contact_name" character varying(200), "emergency_contact_phone" character varying(30), "created_at" TIMESTAMP NOT NULL DEFAULT now(), "updated_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "UQ_patients_national_id" UNIQUE ("national_id"), CONSTRAINT "chk_patients_first_name" CHECK (length("first_name") > 0), CONSTRAINT "PK_patients" PRIMARY KEY ("patient_id"))`);
        await queryRunner.query(`CREATE INDEX "idx_patients_name" ON "patients" ("last_name", "first_name")`);
        await queryRunner.query(`CREATE TABLE "specialties" ("specialty_id" SERIAL NOT NULL, "name" character varying(100) NOT NULL, "description" text, CONSTRAINT "UQ_specialties_name" UNIQUE ("name"), CONSTRAINT "PK_specialties" PRIMARY KEY ("specialty_id"))`);
        await queryRunner.query(`CREATE TABLE "doctors" ("doctor_id" SERIAL NOT NULL, "user_id" integer, "first_name" character varying(100) NOT NULL, "last_name" character varying(100) NOT NULL, "phone" character varying(30), "email" character varying(255), "license_number" character varying(100) NOT NULL, "hire_date" date, "created_at" TIMESTAMP NOT NULL DEFAULT now(), "updated_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "UQ_doctors_user_id" UNIQUE ("user_id"), CONSTRAINT "UQ_doctors_license_number" UNIQUE ("license_number"), CONSTRAINT "PK_doctors" PRIMARY KEY ("doctor_id"))`);
        await queryRunner.query(`CREATE TABLE "doctor_specialties" ("doctor_id" integer NOT NULL, "specialty_id" integer NOT NULL, CONSTRAINT "PK_doctor_specialties" PRIMARY KEY ("doctor_id", "specialty_id"))`);
        await queryRunner.query(`CREATE TABLE "patient_doctors" ("patient_id" integer NOT NULL, "doctor_id" integer NOT NULL, "is_primary" boolean NOT NULL DEFAULT false, "assigned_date" date NOT NULL DEFAULT CURRENT_DATE, CONSTRAINT "PK_patient_doctors" PRIMARY KEY ("patient_id", "doctor_id"))`);
        await queryRunner.query(`CREATE TABLE "rooms" ("room_id" SERIAL NOT NULL, "room_name" character varying(50) NOT NULL, "description" character varying(255), "capacity" integer NOT NULL DEFAULT 1, "created_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "UQ_rooms_room_name" UNIQUE ("room_name"), CONSTRAINT "PK_rooms" PRIMARY KEY ("room_id"))`);
        await queryRunner.query(`CREATE TABLE "services" ("service_id" SERIAL NOT NULL, "code" character varying(30) NOT NULL, "name" character varying(150) NOT NULL, "description" text, "price" numeric(12,2) NOT NULL DEFAULT 0, "duration_minutes" integer NOT NULL DEFAULT 30, "created_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "UQ_services_code" UNIQUE ("code"), CONSTRAINT "PK_services" PRIMARY KEY ("service_id"))`);
        await queryRunner.query(`CREATE INDEX "idx_services_name" ON "services" ("name")`);
        await queryRunner.query(`CREATE TABLE "appointments" ("appointment_id" SERIAL NOT NULL, "patient_id" integer NOT NULL, "doctor_id" integer NOT NULL, "room_id" integer, "scheduled_start" TIMESTAMP NOT NULL, "scheduled_end" TIMESTAMP NOT NULL, "status" "appointments_status_enum" NOT NULL DEFAULT 'scheduled', "reason" text, "created_by" integer, "created_at" TIMESTAMP NOT NULL DEFAULT now(), "updated_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "chk_times" CHECK ("scheduled_end" > "scheduled_start"), CONSTRAINT "PK_appointments" PRIMARY KEY ("appointment_id"))`);
        await queryRunner.query(`CREATE INDEX "idx_appointments_patient" ON "appointments" ("patient_id")`);
        await queryRunner.query(`CREATE INDEX "idx_appointments_doctor" ON "appointments" ("doctor_id")`);
        await queryRunner.query(`CREATE TABLE "appointment_services" ("appointment_id" integer NOT NULL, "service_id" integer NOT NULL, "quantity" integer NOT NULL DEFAULT 1, "unit_price" numeric(12,2) NOT NULL, CONSTRAINT "PK_appointment_services" PRIMARY KEY ("appointment_id", "service_id"))`);
        await queryRunner.query(`CREATE TABLE "medications" ("medication_id" SERIAL NOT NULL, "name" character varying(200) NOT NULL, "manufacturer" character varying(200), "unit" character varying(50), "strength" character varying(100), "created_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "uq_medications_name_strength" UNIQUE ("name", "strength"), CONSTRAINT "PK_medications" PRIMARY KEY ("medication_id"))`);
        await queryRunner.query(`CREATE TABLE "prescriptions" ("prescription_id" SERIAL NOT NULL, "appointment_id" integer NOT NULL, "prescribed_by" integer NOT NULL, "notes" text, "created_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "UQ_prescriptions_appointment_id" UNIQUE ("appointment_id"), CONSTRAINT "PK_prescriptions" PRIMARY KEY ("prescription_id"))`);
        await queryRunner.query(`CREATE TABLE "prescription_items" ("prescription_item_id" SERIAL NOT NULL, "prescription_id" integer NOT NULL, "medication_id" integer NOT NULL, "dosage" character varying(100) NOT NULL, "frequency" character varying(100) NOT NULL, "duration_days" integer, "instructions" text, CONSTRAINT "PK_prescription_items" PRIMARY KEY ("prescription_item_id"))`);
        await queryRunner.query(`CREATE TABLE "invoices" ("invoice_id" SERIAL NOT NULL, "patient_id" integer NOT NULL, "appointment_id" integer, "invoice_date" date NOT NULL DEFAULT CURRENT_DATE, "total_amount" numeric(12,2) NOT NULL DEFAULT 0, "status" "invoices_status_enum" NOT NULL DEFAULT 'pending', "created_by" integer, "created_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_invoices" PRIMARY KEY ("invoice_id"))`);
        await queryRunner.query(`CREATE TABLE "invoice_items" ("invoice_item_id" SERIAL NOT NULL, "invoice_id" integer NOT NULL, "description" character varying(255) NOT NULL, "service_id" integer, "medication_id" integer, "quantity" integer NOT NULL DEFAULT 1, "unit_price" numeric(12,2) NOT NULL, "line_total" numeric(12,2) GENERATED ALWAYS AS ("quantity" * "unit_price") STORED, CONSTRAINT "chk_invoice_items_subject" CHECK ("service_id" IS NOT NULL OR "medication_id" IS NOT NULL OR "description" <> ''), CONSTRAINT "PK_invoice_items" PRIMARY KEY ("invoice_item_id"))`);
        await queryRunner.query(`CREATE TABLE "inventory" ("inventory_id" SERIAL NOT NULL, "medication_id" integer NOT NULL, "quantity_on_hand" integer NOT NULL DEFAULT 0, "reorder_level" integer NOT NULL DEFAULT 0, "last_restock" date, CONSTRAINT "UQ_inventory_medication_id" UNIQUE ("medication_id"), CONSTRAINT "PK_inventory" PRIMARY KEY ("inventory_id"))`);

        await queryRunner.query(`ALTER TABLE "doctors" ADD CONSTRAINT "FK_doctors_user" FOREIGN KEY ("user_id") REFERENCES "users"("user_id") ON DELETE SET NULL ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "doctor_specialties" ADD CONSTRAINT "FK_doctor_specialties_doctor" FOREIGN KEY ("doctor_id") REFERENCES "doctors"("doctor_id") ON DELETE CASCADE ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "doctor_specialties" ADD CONSTRAINT "FK_doctor_specialties_specialty" FOREIGN KEY ("specialty_id") REFERENCES "specialties"("specialty_id") ON DELETE CASCADE ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "patient_doctors" ADD CONSTRAINT "FK_patient_doctors_patient" FOREIGN KEY ("patient_id") REFERENCES "patients"("patient_id") ON DELETE CASCADE ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "patient_doctors" ADD CONSTRAINT "FK_patient_doctors_doctor" FOREIGN KEY ("doctor_id") REFERENCES "doctors"("doctor_id") ON DELETE CASCADE ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "appointments" ADD CONSTRAINT "FK_appointments_patient" FOREIGN KEY ("patient_id") REFERENCES "patients"("patient_id") ON DELETE RESTRICT ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "appointments" ADD CONSTRAINT "FK_appointments_doctor" FOREIGN KEY ("doctor_id") REFERENCES "doctors"("doctor_id") ON DELETE RESTRICT ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "appointments" ADD CONSTRAINT "FK_appointments_room" FOREIGN KEY ("room_id") REFERENCES "rooms"("room_id") ON DELETE SET NULL ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "appointments" ADD CONSTRAINT "FK_appointments_created_by" FOREIGN KEY ("created_by") REFERENCES "users"("user_id") ON DELETE SET NULL ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "appointment_services" ADD CONSTRAINT "FK_appointment_services_appointment" FOREIGN KEY ("appointment_id") REFERENCES "appointments"("appointment_id") ON DELETE CASCADE ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "appointment_services" ADD CONSTRAINT "FK_appointment_services_service" FOREIGN KEY ("service_id") REFERENCES "services"("service_id") ON DELETE RESTRICT ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "prescriptions" ADD CONSTRAINT "FK_prescriptions_appointment" FOREIGN KEY ("appointment_id") REFERENCES "appointments"("appointment_id") ON DELETE CASCADE ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "prescriptions" ADD CONSTRAINT "FK_prescriptions_prescribed_by" FOREIGN KEY ("prescribed_by") REFERENCES "doctors"("doctor_id") ON DELETE RESTRICT ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "prescription_items" ADD CONSTRAINT "FK_prescription_items_prescription" FOREIGN KEY ("prescription_id") REFERENCES "prescriptions"("prescription_id") ON DELETE CASCADE ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "prescription_items" ADD CONSTRAINT "FK_prescription_items_medication" FOREIGN KEY ("medication_id") REFERENCES "medications"("medication_id") ON DELETE RESTRICT ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "invoices" ADD CONSTRAINT "FK_invoices_patient" FOREIGN KEY ("patient_id") REFERENCES "patients"("patient_id") ON DELETE RESTRICT ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "invoices" ADD CONSTRAINT "FK_invoices_appointment" FOREIGN KEY ("appointment_id") REFERENCES "appointments"("appointment_id") ON DELETE SET NULL ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "invoices" ADD CONSTRAINT "FK_invoices_created_by" FOREIGN KEY ("created_by") REFERENCES "users"("user_id") ON DELETE SET NULL ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "invoice_items" ADD CONSTRAINT "FK_invoice_items_invoice" FOREIGN KEY ("invoice_id") REFERENCES "invoices"("invoice_id") ON DELETE CASCADE ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "invoice_items" ADD CONSTRAINT "FK_invoice_items_service" FOREIGN KEY ("service_id") REFERENCES "services"("service_id") ON DELETE SET NULL ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "invoice_items" ADD CONSTRAINT "FK_invoice_items_medication" FOREIGN KEY ("medication_id") REFERENCES "medications"("medication_id") ON DELETE SET NULL ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "inventory" ADD CONSTRAINT "FK_inventory_medication" FOREIGN KEY ("medication_id") REFERENCES "medications"("medication_id") ON DELETE CASCADE ON UPDATE NO ACTION`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "inventory" DROP CONSTRAINT "FK_inventory_medication"`);
        await queryRunner.query(`ALTER TABLE "invoice_items" DROP CONSTRAINT "FK_invoice_items_medication"`);
        await queryRunner.query(`ALTER TABLE "invoice_items" DROP CONSTRAINT "FK_invoice_items_service"`);
        await queryRunner.query(`ALTER TABLE "invoice_items" DROP CONSTRAINT "FK_invoice_items_invoice"`);
        await queryRunner.query(`ALTER TABLE "invoices" DROP CONSTRAINT "FK_invoices_created_by"`);
        await queryRunner.query(`ALTER TABLE "invoices" DROP CONSTRAINT "FK_invoices_appointment"`);
        await queryRunner.query(`ALTER TABLE "invoices" DROP CONSTRAINT "FK_invoices_patient"`);
        await queryRunner.query(`ALTER TABLE "prescription_items" DROP CONSTRAINT "FK_prescription_items_medication"`);
        await queryRunner.query(`ALTER TABLE "prescription_items" DROP CONSTRAINT "FK_prescription_items_prescription"`);
        await queryRunner.query(`ALTER TABLE "prescriptions" DROP CONSTRAINT "FK_prescriptions_prescribed_by"`);
        await queryRunner.query(`ALTER TABLE "prescriptions" DROP CONSTRAINT "FK_prescriptions_appointment"`);
        await queryRunner.query(`ALTER TABLE "appointment_services" DROP CONSTRAINT "FK_appointment_services_service"`);
        await queryRunner.query(`ALTER TABLE "appointment_services" DROP CONSTRAINT "FK_appointment_services_appointment"`);
        await queryRunner.query(`ALTER TABLE "appointments" DROP CONSTRAINT "FK_appointments_created_by"`);
        await queryRunner.query(`ALTER TABLE "appointments" DROP CONSTRAINT "FK_appointments_room"`);
        await queryRunner.query(`ALTER TABLE "appointments" DROP CONSTRAINT "FK_appointments_doctor"`);
        await queryRunner.query(`ALTER TABLE "appointments" DROP CONSTRAINT "FK_appointments_patient"`);
        await queryRunner.query(`ALTER TABLE "patient_doctors" DROP CONSTRAINT "FK_patient_doctors_doctor"`);
        await queryRunner.query(`ALTER TABLE "patient_doctors" DROP CONSTRAINT "FK_patient_doctors_patient"`);
        await queryRunner.query(`ALTER TABLE "doctor_specialties" DROP CONSTRAINT "FK_doctor_specialties_specialty"`);
        await queryRunner.query(`ALTER TABLE "doctor_specialties" DROP CONSTRAINT "FK_doctor_specialties_doctor"`);
        await queryRunner.query(`ALTER TABLE "doctors" DROP CONSTRAINT "FK_doctors_user"`);
        await queryRunner.query(`DROP TABLE "inventory"`);
        await queryRunner.query(`DROP TABLE "invoice_items"`);
        await queryRunner.query(`DROP TABLE "invoices"`);
        await queryRunner.query(`DROP TABLE "prescription_items"`);
        await queryRunner.query(`DROP TABLE "prescriptions"`);
        await queryRunner.query(`DROP TABLE "medications"`);
        await queryRunner.query(`DROP TABLE "appointment_services"`);
        await queryRunner.query(`DROP INDEX "idx_appointments_doctor"`);
        await queryRunner.query(`DROP INDEX "idx_appointments_patient"`);
        await queryRunner.query(`DROP TABLE "appointments"`);
        await queryRunner.query(`DROP INDEX "idx_services_name"`);
        await queryRunner.query(`DROP TABLE "services"`);
        await queryRunner.query(`DROP TABLE "rooms"`);
        await queryRunner.query(`DROP TABLE "patient_doctors"`);
        await queryRunner.query(`DROP TABLE "doctor_specialties"`);
        await queryRunner.query(`DROP TABLE "doctors"`);
        await queryRunner.query(`DROP TABLE "specialties"`);
        await queryRunner.query(`DROP INDEX "idx_patients_name"`);
        await queryRunner.query(`DROP TABLE "patients"`);
        await queryRunner.query(`DROP TABLE "users"`);
        await queryRunner.query(`DROP TYPE "invoices_status_enum"`);
        await queryRunner.query(`DROP TYPE "appointments_status_enum"`);
        await queryRunner.query(`DROP TYPE "patients_gender_enum"`);
        await queryRunner.query(`DROP TYPE "users_role_enum"`);
    }

}
