export type CommandSection = 'contacts' | 'notes';

export interface CommandDescription {
    command: string;
    usage: string;
    route: string;
}

const contactCommands: CommandDescription[] = [
    { command: 'add', usage: 'add <Name> [Surname] [Phone] [Email] [Address]', route: '/api/contacts/crud/contactAddOrUpdate' },
    { command: 'change', usage: 'change <Name> - replace the phone, email or address', route: '/api/contacts/crud/contactPhoneChange' },
    { command: 'edit-phone', usage: 'edit-phone <Name> <Index> <Phone>', route: '/api/contacts/crud/contactPhoneEdit' },
    { command: 'remove-phone', usage: 'remove-phone <Name> <Phone>', route: '/api/contacts/crud/contactPhoneRemove' },
    { command: 'phone', usage: 'phone <Name>', route: '/api/contacts/crud/contactPhoneGet' },
    { command: 'show', usage: 'show <Name>', route: '/api/contacts/crud/contactGet' },
    { command: 'delete', usage: 'delete <Name>', route: '/api/contacts/crud/contactDelete' },
    { command: 'all', usage: 'all - list every contact', route: '/api/contacts/crud/contactList' },
    { command: 'search', usage: 'search <query> - name, surname, phone or contact notes', route: '/api/contacts/crud/contactSearch' },
    { command: 'add-birthday', usage: 'add-birthday <Name> <DD.MM.YYYY>', route: '/api/contacts/birthday/birthdayAdd' },
    { command: 'show-birthday', usage: 'show-birthday <Name|Surname>', route: '/api/contacts/birthday/birthdayShow' },
    { command: 'birthdays', usage: 'birthdays <N> - birthdays in the next N days', route: '/api/contacts/birthday/birthdaysUpcoming' },
    { command: 'add-contact-note', usage: 'add-contact-note <Name> <Text>', route: '/api/contacts/crud/contactNoteAdd' },
    { command: 'change-address', usage: 'change-address <Name> <New address>', route: '/api/contacts/crud/contactAddressChange' },
    { command: 'change-email', usage: 'change-email <Name> <New email>', route: '/api/contacts/crud/contactEmailChange' },
    { command: 'help', usage: 'help - list the commands', route: '/api/command/commandHelp' },
];

const noteCommands: CommandDescription[] = [
    { command: 'add-note', usage: 'add-note <Text> [Tags]', route: '/api/notes/book/noteAdd' },
    { command: 'list-notes', usage: 'list-notes - view all notes', route: '/api/notes/book/noteList' },
    { command: 'add-tag', usage: 'add-tag <Note number> <Tags>', route: '/api/notes/book/noteTagAdd' },
    { command: 'search-tag', usage: 'search-tag <Tag> - find notes by tag', route: '/api/notes/book/noteSearchTag' },
    { command: 'search-note', usage: 'search-note <Phrase> - find notes by text', route: '/api/notes/book/noteSearch' },
    { command: 'help', usage: 'help - list the commands', route: '/api/command/commandHelp' },
];

const getCommandsBySection = (section: CommandSection): CommandDescription[] => {
    if (section === 'notes') {
        return noteCommands;
    }
    return contactCommands;
};

const isCommandSection = (value: unknown): value is CommandSection => {
    return value === 'contacts' || value === 'notes';
};

export {
    getCommandsBySection,
    isCommandSection,
};
